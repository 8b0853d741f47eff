import { Entity, Column, PrimaryColumn, Index } from 'typeorm';

/**
 * ComponentTelemetry Entity - one inverter reading per timestamp.
 *
 * Maps the warehouse table `component_telemetry`. Rows carry the full
 * site → skid → inverter path, so the same rows feed both the skid
 * leaderboard (grouped by skidId) and the inverter leaderboard
 * (grouped by inverterId).
 *
 * Composite Primary Key: [inverterId, timestamp]
 *
 * Power columns are nullable in the warehouse; a null becomes NaN when
 * the row is mapped to a Sample, so the validator drops it.
 */
@Entity('component_telemetry')
@Index('idx_component_telemetry_site_timestamp', ['siteId', 'timestamp'])
@Index('idx_component_telemetry_skid_timestamp', ['skidId', 'timestamp'])
export class ComponentTelemetry {
  /**
   * Reading timestamp (UTC).
   */
  @PrimaryColumn({ type: 'timestamptz' })
  timestamp!: Date;

  @PrimaryColumn({ name: 'inverter_id', type: 'varchar', length: 64 })
  inverterId!: string;

  @Column({ name: 'skid_id', type: 'varchar', length: 64 })
  skidId!: string;

  @Column({ name: 'site_id', type: 'varchar', length: 64 })
  siteId!: string;

  /**
   * Plane-of-array irradiance in W/m².
   */
  @Column({ name: 'poa_irradiance', type: 'float', nullable: true })
  poaIrradiance!: number | null;

  /**
   * Measured AC power in kW.
   */
  @Column({ name: 'actual_power', type: 'float', nullable: true })
  actualPower!: number | null;

  /**
   * Modelled power in kW from the expected-generation model.
   */
  @Column({ name: 'expected_power', type: 'float', nullable: true })
  expectedPower!: number | null;

  /**
   * Fraction of the interval the inverter was available (0.0 - 1.0).
   */
  @Column({ name: 'inverter_availability', type: 'float', nullable: true })
  inverterAvailability!: number | null;
}
