import {
  Entity,
  PrimaryGeneratedColumn,
  Column,
  CreateDateColumn,
  Index,
} from "typeorm";

/**
 * Expected Attendance Entity
 *
 * Hourly attendance forecast from the vendor's trend-line endpoint.
 * Each refresh replaces the 16 rows of a branch inside one transaction.
 */
@Entity("expected_attendance")
@Index(["branchId", "hour"])
export class ExpectedAttendance {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: "branch_id", type: "smallint" })
  branchId!: number;

  @Column({ type: "smallint" })
  hour!: number;

  @Column({ type: "double precision" })
  percentage!: number;

  @Column({ type: "double precision", nullable: true })
  remaining!: number | null;

  @CreateDateColumn({ name: "created_at", type: "timestamptz" })
  createdAt!: Date;
}
