import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import schedulingConfig from './config/scheduling.config.js';
import { DatabaseModule } from './database/database.module.js';
import { AppController } from './app.controller.js';
import { AppointmentModule } from './modules/appointment/appointment.module.js';
import { AvailabilityModule } from './modules/availability/availability.module.js';
import { PhysicianModule } from './modules/physician/physician.module.js';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env.local', '.env'],
      load: [schedulingConfig],
    }),
    DatabaseModule,
    AppointmentModule,
    AvailabilityModule,
    PhysicianModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
