import { MigrationInterface, QueryRunner } from "typeorm";

// net is taken from the already rounded bonus and tax, like the application does
export const SALARY_SUMMARY_VIEW = `
  CREATE OR REPLACE VIEW salary_summary AS
  SELECT
    employee_id,
    name,
    basic_salary,
    bonus_percentage,
    tax_percentage,
    ROUND(basic_salary * (bonus_percentage / 100), 2) AS calculated_bonus,
    ROUND(basic_salary * (tax_percentage / 100), 2) AS calculated_tax,
    ROUND(
      basic_salary
        + ROUND(basic_salary * (bonus_percentage / 100), 2)
        - ROUND(basic_salary * (tax_percentage / 100), 2),
      2
    ) AS net_salary
  FROM employees;
`;

export class CreateEmployeesTable1680000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS employees (
        employee_id SERIAL PRIMARY KEY,
        name VARCHAR(100) NOT NULL,
        basic_salary NUMERIC(10,2) NOT NULL,
        bonus_percentage NUMERIC(5,2) DEFAULT 0.00,
        tax_percentage NUMERIC(5,2) DEFAULT 0.00,
        created_at TIMESTAMPTZ DEFAULT NOW(),
        updated_at TIMESTAMPTZ DEFAULT NOW()
      );
    `);

    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_employee_name ON employees(name);`);
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_basic_salary ON employees(basic_salary);`);

    await queryRunner.query(SALARY_SUMMARY_VIEW);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP VIEW IF EXISTS salary_summary;`);
    await queryRunner.query(`DROP INDEX IF EXISTS idx_basic_salary;`);
    await queryRunner.query(`DROP INDEX IF EXISTS idx_employee_name;`);
    await queryRunner.query(`DROP TABLE IF EXISTS employees;`);
  }
}
