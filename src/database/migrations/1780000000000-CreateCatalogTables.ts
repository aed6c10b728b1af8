import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

export class CreateCatalogTables1780000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'departments',
        columns: [
          {
            name: 'code',
            type: 'varchar',
            length: '20',
            isPrimary: true,
          },
          {
            name: 'name',
            type: 'varchar',
            length: '100',
            isNullable: false,
          },
          {
            name: 'module_quota',
            type: 'integer',
            isNullable: false,
          },
        ],
        checks: [{ expression: '"module_quota" >= 0' }],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'modules',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'name',
            type: 'varchar',
            length: '100',
            isNullable: false,
            isUnique: true,
          },
          {
            name: 'description',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'active',
            type: 'boolean',
            default: true,
            isNullable: false,
          },
          {
            name: 'allowed_departments',
            type: 'varchar',
            length: '20',
            isArray: true,
            default: "'{}'",
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'module_incompatibilities',
        columns: [
          {
            name: 'module_a_id',
            type: 'integer',
            isPrimary: true,
          },
          {
            name: 'module_b_id',
            type: 'integer',
            isPrimary: true,
          },
          {
            name: 'reason',
            type: 'text',
            isNullable: true,
          },
        ],
        // Pairs are stored once, lowest ID first
        checks: [{ expression: '"module_a_id" < "module_b_id"' }],
      }),
      true,
    );

    await queryRunner.createForeignKeys('module_incompatibilities', [
      new TableForeignKey({
        columnNames: ['module_a_id'],
        referencedTableName: 'modules',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
      new TableForeignKey({
        columnNames: ['module_b_id'],
        referencedTableName: 'modules',
        referencedColumnNames: ['id'],
        onDelete: 'CASCADE',
      }),
    ]);

    await queryRunner.createIndex(
      'module_incompatibilities',
      new TableIndex({
        name: 'IDX_module_incompatibilities_module_b_id',
        columnNames: ['module_b_id'],
      }),
    );

    // Reference data
    await queryRunner.query(`
      INSERT INTO departments (code, name, module_quota) VALUES
        ('IT', 'Information Technology', 10),
        ('FINANCE', 'Finance', 5),
        ('HR', 'Human Resources', 5),
        ('OPERATIONS', 'Operations', 5),
        ('OTHER', 'Other', 5);
    `);

    await queryRunner.query(`
      INSERT INTO modules (id, name, description, active, allowed_departments) VALUES
        (1, 'Financial Management', 'General ledger and accounts payable', true, '{FINANCE}'),
        (2, 'Financial Approver', 'Approval of payments and purchase orders', true, '{FINANCE}'),
        (3, 'Financial Requester', 'Submission of payments and purchase orders', true, '{FINANCE,OPERATIONS}'),
        (4, 'Inventory Control', 'Stock levels and warehouse movements', true, '{OPERATIONS}'),
        (5, 'Purchasing', 'Supplier quotes and purchase orders', true, '{OPERATIONS,FINANCE}'),
        (6, 'Payroll', 'Salary processing and payslips', true, '{HR,FINANCE}'),
        (7, 'Recruitment', 'Job openings and candidate pipeline', true, '{HR}'),
        (8, 'Reports Portal', 'Read-only management reports', true, '{FINANCE,HR,OPERATIONS,OTHER}'),
        (9, 'Legacy Time Tracking', 'Replaced by the new attendance system', false, '{HR,OPERATIONS}');
    `);

    await queryRunner.query(
      `SELECT setval(pg_get_serial_sequence('modules', 'id'), (SELECT MAX(id) FROM modules));`,
    );

    await queryRunner.query(`
      INSERT INTO module_incompatibilities (module_a_id, module_b_id, reason) VALUES
        (2, 3, 'Segregation of duties: approving and requesting payments'),
        (2, 5, 'Segregation of duties: approving and issuing purchase orders');
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('module_incompatibilities', true, true, true);
    await queryRunner.dropTable('modules', true);
    await queryRunner.dropTable('departments', true);
  }
}
