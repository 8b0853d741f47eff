import { Entity, Column, PrimaryColumn } from 'typeorm';

/**
 * Site Entity - solar installation metadata.
 *
 * Maps the warehouse table `site_metadata`.
 */
@Entity('site_metadata')
export class Site {
  /**
   * Site code, e.g. "ASMB2".
   */
  @PrimaryColumn({ name: 'site', type: 'varchar', length: 64 })
  siteId!: string;

  @Column({ name: 'site_name', type: 'varchar', length: 255, nullable: true })
  siteName!: string | null;

  /**
   * State or region.
   */
  @Column({ name: 'state', type: 'varchar', length: 128, nullable: true })
  location!: string | null;

  /**
   * POI-limited AC capacity in kW.
   */
  @Column({ name: 'ac_capacity_poi_limited', type: 'float', nullable: true })
  capacityKw!: number | null;

  /**
   * Commercial operation date.
   */
  @Column({ name: 'cod_date', type: 'date', nullable: true })
  installationDate!: string | null;
}
