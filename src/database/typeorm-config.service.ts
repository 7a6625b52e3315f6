import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    const database = this.configService.getOrThrow('database', {
      infer: true,
    });

    return {
      type: 'better-sqlite3',
      database: database.path,
      synchronize: database.synchronize,
      dropSchema: database.dropSchema,
      logging: database.logging,
      // Entities are registered through TypeOrmModule.forFeature in BookingModule
      autoLoadEntities: true,
    };
  }
}
