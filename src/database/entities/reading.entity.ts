import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryColumn,
  ValueTransformer,
} from 'typeorm';

/**
 * Stores a Date as epoch milliseconds. The key is then an absolute instant on
 * every driver, independent of the host or session time zone. pg returns
 * BIGINT as a string.
 */
export const epochMillis: ValueTransformer = {
  to: (value: Date | null | undefined): number | null | undefined =>
    value instanceof Date ? value.getTime() : value,
  from: (value: string | number | null): Date | null =>
    value === null ? null : new Date(Number(value)),
};

/**
 * Reading Entity - one stored sample of one device
 *
 * Composite Primary Key: [deviceId, timestamp]
 * - One reading per device per instant; the store rejects out-of-order writes
 *   so timestamps are strictly increasing per device
 * - Range scans for a device walk the primary key index
 *
 * The timestamp is a BIGINT of epoch milliseconds so the same entity maps
 * onto PostgreSQL and SQLite.
 */
@Entity('readings')
@Index('idx_readings_timestamp', ['timestamp'])
export class Reading {
  @PrimaryColumn({ type: 'varchar', length: 64 })
  deviceId!: string;

  /**
   * Sample time, stored as epoch milliseconds.
   */
  @PrimaryColumn({ type: 'bigint', transformer: epochMillis })
  timestamp!: Date;

  /** Raw sensor value (volts at the ADC input). */
  @Column({ type: 'float' })
  rawValue!: number;

  /** Calibrated power in Watts, never negative. */
  @Column({ type: 'float' })
  powerWatts!: number;

  /**
   * Energy in Wh for the interval since the device's previous stored reading
   * (trapezoidal). 0 for a device's first reading.
   */
  @Column({ type: 'float' })
  energyWh!: number;

  /** Cost of `energyWh` at `ratePerKwh`. */
  @Column({ type: 'float' })
  cost!: number;

  /** Tariff rate applied when the reading was written. */
  @Column({ type: 'float' })
  ratePerKwh!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
