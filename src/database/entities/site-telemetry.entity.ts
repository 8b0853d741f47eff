import { Entity, Column, PrimaryColumn } from 'typeorm';

/**
 * SiteTelemetry Entity - site-level readings at the revenue meter.
 *
 * Maps the warehouse table `inverter_telemetry`, which despite its name
 * holds one row per site per timestamp.
 *
 * Composite Primary Key: [siteId, timestamp]
 */
@Entity('inverter_telemetry')
export class SiteTelemetry {
  @PrimaryColumn({ type: 'timestamptz' })
  timestamp!: Date;

  @PrimaryColumn({ name: 'site_id', type: 'varchar', length: 64 })
  siteId!: string;

  /** W/m² */
  @Column({ name: 'poa_irradiance', type: 'float', nullable: true })
  poaIrradiance!: number | null;

  /** kW */
  @Column({ name: 'actual_power', type: 'float', nullable: true })
  actualPower!: number | null;

  /** kW */
  @Column({ name: 'expected_power', type: 'float', nullable: true })
  expectedPower!: number | null;

  @Column({ name: 'inverter_availability', type: 'float', nullable: true })
  inverterAvailability!: number | null;
}
