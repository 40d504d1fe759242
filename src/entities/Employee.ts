import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Index, ValueTransformer } from 'typeorm';

// pg hands NUMERIC columns back as strings
export const decimalTransformer: ValueTransformer = {
  to: (value?: number | null) => value,
  from: (value?: string | number | null) => (value === null || value === undefined ? value : Number(value)),
};

@Entity('employees')
@Index('idx_employee_name', ['name'])
@Index('idx_basic_salary', ['basicSalary'])
export class Employee {
  @PrimaryGeneratedColumn({ name: 'employee_id' })
  employeeId!: number;

  @Column({ name: 'name', type: 'varchar', length: 100 })
  name!: string;

  @Column({ name: 'basic_salary', type: 'numeric', precision: 10, scale: 2, transformer: decimalTransformer })
  basicSalary!: number;

  @Column({ name: 'bonus_percentage', type: 'numeric', precision: 5, scale: 2, default: 0, transformer: decimalTransformer })
  bonusPercentage!: number;

  @Column({ name: 'tax_percentage', type: 'numeric', precision: 5, scale: 2, default: 0, transformer: decimalTransformer })
  taxPercentage!: number;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz', nullable: true })
  createdAt?: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz', nullable: true })
  updatedAt?: Date;
}
