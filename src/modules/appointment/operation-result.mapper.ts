import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';
import type { ScheduleOperationResult } from '../scheduling/domain/schedule-conflict.js';
import {
  presentAppointment,
  presentConflict,
  presentSlot,
} from '../scheduling/scheduling.presenter.js';

/** Returns the committed appointment or throws the matching HTTP error. */
export function unwrapOperationResult(result: ScheduleOperationResult) {
  switch (result.failure) {
    case null:
      if (!result.appointment) {
        throw new InternalServerErrorException(
          'Operation succeeded without an appointment',
        );
      }
      return presentAppointment(result.appointment);
    case 'conflict':
      throw new ConflictException({
        error: 'scheduling_conflict',
        message: result.message,
        conflicts: result.conflicts.map(presentConflict),
        alternatives: result.alternativeSuggestions.map(presentSlot),
      });
    case 'not_found':
      throw new NotFoundException(result.message);
    case 'validation':
      throw new BadRequestException(result.message);
    case 'invariant_violation':
      throw new BadRequestException({
        error: 'invariant_violation',
        message: result.message,
      });
    case 'internal':
      throw new InternalServerErrorException(result.message);
  }
}
