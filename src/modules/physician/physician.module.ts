import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { resolve } from 'path';
import { PhysicianController } from './physician.controller.js';
import {
  PhysicianDirectory,
  loadPhysicianDirectory,
} from './physician-directory.js';

@Module({
  controllers: [PhysicianController],
  providers: [
    {
      provide: PhysicianDirectory,
      useFactory: (config: ConfigService): PhysicianDirectory =>
        loadPhysicianDirectory(
          resolve(
            config.get<string>('PHYSICIAN_DIRECTORY_FILE') ??
              'data/physicians.json',
          ),
        ),
      inject: [ConfigService],
    },
  ],
  exports: [PhysicianDirectory],
})
export class PhysicianModule {}
