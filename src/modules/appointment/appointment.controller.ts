import {
  Controller,
  Get,
  Post,
  Put,
  Patch,
  Delete,
  Param,
  Body,
  Query,
  HttpCode,
  HttpStatus,
  ParseUUIDPipe,
  BadRequestException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import { ApiTags, ApiOperation, ApiQuery } from '@nestjs/swagger';
import { SchedulerService } from '../scheduling/scheduler.service.js';
import {
  presentAppointment,
  presentAuditEntry,
  presentConflictResult,
  presentSlot,
  presentStatistics,
} from '../scheduling/scheduling.presenter.js';
import { CancelAppointmentSchema } from './dto/cancel-appointment.dto.js';
import { CheckConflictsSchema } from './dto/check-conflicts.dto.js';
import { CreateAppointmentSchema } from './dto/create-appointment.dto.js';
import {
  ScheduleQuerySchema,
  SlotQuerySchema,
  StatisticsQuerySchema,
} from './dto/physician-queries.dto.js';
import { RescheduleAppointmentSchema } from './dto/reschedule-appointment.dto.js';
import { toTimeWindow } from './dto/time-window.js';
import { UpdateAppointmentSchema } from './dto/update-appointment.dto.js';
import {
  LinkClinicalDocumentSchema,
  UpdateStatusSchema,
} from './dto/update-status.dto.js';
import { unwrapOperationResult } from './operation-result.mapper.js';

@ApiTags('Appointments')
@Controller('appointments')
export class AppointmentController {
  constructor(private readonly scheduler: SchedulerService) {}

  @Post()
  @ApiOperation({ summary: 'Book an appointment' })
  async create(@Body() body: unknown) {
    const parsed = CreateAppointmentSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const dto = parsed.data;
    const result = await this.scheduler.scheduleAppointment({
      physicianId: dto.physician_id,
      patientId: dto.patient_id,
      ...toTimeWindow(dto),
      reasonForVisit: dto.reason_for_visit,
      notes: dto.notes,
      roomNumber: dto.room_number,
      clinicalDocumentId: dto.clinical_document_id,
    });
    return unwrapOperationResult(result);
  }

  @Post('conflicts')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Check a proposed time without booking it' })
  async checkConflicts(@Body() body: unknown) {
    const parsed = CheckConflictsSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const dto = parsed.data;
    const result = await this.scheduler.checkForConflicts(
      { physicianId: dto.physician_id, ...toTimeWindow(dto) },
      dto.exclude_appointment_id,
      dto.include_suggestions,
    );
    return presentConflictResult(result);
  }

  @Get()
  @ApiOperation({ summary: 'List appointments, optionally for one patient' })
  @ApiQuery({ name: 'patient_id', type: String, required: false })
  async findAll(
    @Query('patient_id', new ParseUUIDPipe({ optional: true }))
    patientId?: string,
  ) {
    const appointments = patientId
      ? await this.scheduler.getPatientAppointments(patientId)
      : await this.scheduler.getAllAppointments();
    return appointments.map(presentAppointment);
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get appointment by ID' })
  async findOne(@Param('id', ParseUUIDPipe) id: string) {
    const appointment = await this.scheduler.findAppointmentById(id);
    if (!appointment) {
      throw new NotFoundException(`Appointment ${id} not found`);
    }
    return presentAppointment(appointment);
  }

  @Patch(':id')
  @ApiOperation({ summary: 'Update details, start or duration of an appointment' })
  async update(@Param('id', ParseUUIDPipe) id: string, @Body() body: unknown) {
    const parsed = UpdateAppointmentSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const dto = parsed.data;
    const result = await this.scheduler.updateAppointment(id, {
      reasonForVisit: dto.reason_for_visit,
      notes: dto.notes,
      durationMinutes: dto.duration_minutes,
      newStart: dto.starts_at !== undefined ? new Date(dto.starts_at) : undefined,
      roomNumber: dto.room_number,
    });
    return unwrapOperationResult(result);
  }

  @Post(':id/reschedule')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Move an appointment to a new time window' })
  async reschedule(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: unknown,
  ) {
    const parsed = RescheduleAppointmentSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const existing = await this.requireAppointment(id);
    const { start, end } = toTimeWindow(parsed.data);
    const result = await this.scheduler.rescheduleAppointment(
      existing.physicianId,
      id,
      start,
      end,
    );
    return unwrapOperationResult(result);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Cancel an appointment, keeping its record' })
  async cancel(@Param('id', ParseUUIDPipe) id: string, @Body() body: unknown) {
    const parsed = CancelAppointmentSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const existing = await this.requireAppointment(id);
    const cancelled = await this.scheduler.cancelAppointment(
      existing.physicianId,
      id,
      parsed.data.reason,
    );

    const current = await this.requireAppointment(id);
    if (!cancelled) {
      if (current.status !== 'scheduled') {
        throw new BadRequestException({
          error: 'invariant_violation',
          message: `Cannot cancel a ${current.status} appointment`,
        });
      }
      throw new InternalServerErrorException('Failed to cancel appointment');
    }
    return presentAppointment(current);
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Permanently delete an appointment' })
  async remove(@Param('id', ParseUUIDPipe) id: string): Promise<void> {
    const existing = await this.requireAppointment(id);
    const deleted = await this.scheduler.deleteAppointment(
      existing.physicianId,
      id,
    );
    if (!deleted) {
      throw new InternalServerErrorException('Failed to delete appointment');
    }
  }

  @Patch(':id/status')
  @ApiOperation({ summary: 'Mark an appointment completed or no-show' })
  async updateStatus(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: unknown,
  ) {
    const parsed = UpdateStatusSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    return unwrapOperationResult(
      await this.scheduler.updateAppointmentStatus(id, parsed.data.status),
    );
  }

  @Put(':id/clinical-document')
  @ApiOperation({ summary: 'Link or unlink a clinical document' })
  async linkClinicalDocument(
    @Param('id', ParseUUIDPipe) id: string,
    @Body() body: unknown,
  ) {
    const parsed = LinkClinicalDocumentSchema.safeParse(body);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    return unwrapOperationResult(
      await this.scheduler.linkClinicalDocument(
        id,
        parsed.data.clinical_document_id,
      ),
    );
  }

  @Get(':id/audit')
  @ApiOperation({ summary: 'Audit trail of an appointment' })
  async auditTrail(@Param('id', ParseUUIDPipe) id: string) {
    const trail = await this.scheduler.getAuditTrail(id);
    if (trail.length === 0) {
      throw new NotFoundException(`Appointment ${id} not found`);
    }
    return trail.map(presentAuditEntry);
  }

  private async requireAppointment(id: string) {
    const appointment = await this.scheduler.findAppointmentById(id);
    if (!appointment) {
      throw new NotFoundException(`Appointment ${id} not found`);
    }
    return appointment;
  }
}

@ApiTags('Physicians')
@Controller('physicians')
export class PhysicianScheduleController {
  constructor(private readonly scheduler: SchedulerService) {}

  @Get(':id/schedule')
  @ApiOperation({ summary: "Get a physician's schedule for a day or a range" })
  @ApiQuery({ name: 'date', type: String, required: false, description: 'YYYY-MM-DD' })
  @ApiQuery({ name: 'from', type: String, required: false })
  @ApiQuery({ name: 'to', type: String, required: false })
  async getSchedule(
    @Param('id', ParseUUIDPipe) physicianId: string,
    @Query() query: Record<string, unknown>,
  ) {
    const parsed = ScheduleQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const schedule = parsed.data;
    const appointments =
      schedule.kind === 'day'
        ? await this.scheduler.getDailySchedule(physicianId, schedule.date)
        : await this.scheduler.getScheduleInRange(
            physicianId,
            schedule.from,
            schedule.to,
          );
    return appointments.map(presentAppointment);
  }

  @Get(':id/next-slot')
  @ApiOperation({ summary: 'Earliest free slot of the given length' })
  @ApiQuery({ name: 'duration_minutes', type: Number, required: true })
  @ApiQuery({ name: 'from', type: String, required: false })
  async getNextSlot(
    @Param('id', ParseUUIDPipe) physicianId: string,
    @Query() query: Record<string, unknown>,
  ) {
    const parsed = SlotQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const { duration_minutes, from } = parsed.data;
    const slot = await this.scheduler.findNextAvailableSlot(
      physicianId,
      duration_minutes,
      from !== undefined ? new Date(from) : undefined,
    );
    return { slot: slot ? presentSlot(slot) : null };
  }

  @Get(':id/slots')
  @ApiOperation({ summary: 'Several free slots of the given length' })
  @ApiQuery({ name: 'duration_minutes', type: Number, required: true })
  @ApiQuery({ name: 'from', type: String, required: false })
  @ApiQuery({ name: 'limit', type: Number, required: false, description: 'Max slots to return (default 3)' })
  async getSlots(
    @Param('id', ParseUUIDPipe) physicianId: string,
    @Query() query: Record<string, unknown>,
  ) {
    const parsed = SlotQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const { duration_minutes, from, limit } = parsed.data;
    const slots = await this.scheduler.findAvailableSlots(
      physicianId,
      duration_minutes,
      limit,
      from !== undefined ? new Date(from) : undefined,
    );
    return { slots: slots.map(presentSlot), limit };
  }

  @Get(':id/statistics')
  @ApiOperation({ summary: 'Appointment counts and utilisation over a range' })
  @ApiQuery({ name: 'from', type: String, required: true })
  @ApiQuery({ name: 'to', type: String, required: true })
  async getStatistics(
    @Param('id', ParseUUIDPipe) physicianId: string,
    @Query() query: Record<string, unknown>,
  ) {
    const parsed = StatisticsQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new BadRequestException(parsed.error.flatten());
    }
    const stats = await this.scheduler.getPhysicianStatistics(
      physicianId,
      new Date(parsed.data.from),
      new Date(parsed.data.to),
    );
    return presentStatistics(stats);
  }
}
