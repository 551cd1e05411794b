import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Reading } from '../database/entities/reading.entity';
import { READING_STORE } from './interfaces/reading-store.interface';
import { TypeOrmReadingStore } from './typeorm-reading.store';

/**
 * ReadingsModule
 *
 * Components:
 * - READING_STORE: TypeOrmReadingStore over the `readings` table
 */
@Module({
  imports: [TypeOrmModule.forFeature([Reading])],
  providers: [{ provide: READING_STORE, useClass: TypeOrmReadingStore }],
  exports: [READING_STORE],
})
export class ReadingsModule {}
