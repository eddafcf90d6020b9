import { Controller, Get, Query } from '@nestjs/common';
import { ApiTags, ApiOperation, ApiQuery } from '@nestjs/swagger';
import { PhysicianDirectory } from './physician-directory.js';

@ApiTags('Physicians')
@Controller('physicians')
export class PhysicianController {
  constructor(private readonly directory: PhysicianDirectory) {}

  @Get()
  @ApiOperation({ summary: 'List physicians' })
  @ApiQuery({ name: 'specialization', type: String, required: false })
  async findAll(@Query('specialization') specialization?: string) {
    return this.directory.listPhysicians(specialization);
  }
}
