import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from "typeorm";

/**
 * Branch Data Entity
 *
 * One occupancy reading per row, appended on every occupancy ingestion.
 * `branchId` holds the registry's storageId; the mapping lives in
 * application code, there is no foreign key.
 *
 * `lastUpdated` is the vendor timestamp shifted by TIMESTAMP_OFFSET_HOURS
 * and stored without a time zone.
 */
@Entity("branch_data")
@Index(["branchId", "id"])
export class BranchData {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: "branch_id", type: "smallint" })
  branchId!: number;

  @Column({ name: "last_updated", type: "timestamp" })
  lastUpdated!: Date;

  @Column({ type: "text" })
  name!: string;

  @Column({ type: "text" })
  status!: string;

  @Column({ name: "current_percentage", type: "double precision" })
  currentPercentage!: number;

  // When this row was written (not the vendor timestamp)
  @CreateDateColumn({ name: "created_at", type: "timestamptz" })
  createdAt!: Date;
}
