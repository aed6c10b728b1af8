import {
  MigrationInterface,
  QueryRunner,
  Table,
  TableForeignKey,
  TableIndex,
} from 'typeorm';

export class CreateAccessRequestTables1780000001000
  implements MigrationInterface
{
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.createTable(
      new Table({
        name: 'access_requests',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'protocol',
            type: 'varchar',
            length: '30',
            isNullable: false,
            isUnique: true,
          },
          {
            name: 'requester_id',
            type: 'varchar',
            length: '100',
            isNullable: false,
          },
          {
            name: 'department',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          {
            name: 'module_ids',
            type: 'integer',
            isArray: true,
            isNullable: false,
          },
          {
            name: 'justification',
            type: 'text',
            isNullable: false,
          },
          {
            name: 'urgent',
            type: 'boolean',
            default: false,
            isNullable: false,
          },
          {
            name: 'status',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          {
            name: 'denial_reason',
            type: 'text',
            isNullable: true,
          },
          {
            name: 'cancellation_reason',
            type: 'varchar',
            length: '200',
            isNullable: true,
          },
          {
            name: 'requested_at',
            type: 'timestamptz',
            isNullable: false,
          },
          {
            name: 'approved_at',
            type: 'timestamptz',
            isNullable: true,
          },
          {
            name: 'expires_at',
            type: 'timestamptz',
            isNullable: true,
          },
          {
            name: 'cancelled_at',
            type: 'timestamptz',
            isNullable: true,
          },
          {
            name: 'renewed_from_id',
            type: 'integer',
            isNullable: true,
          },
        ],
      }),
      true,
    );

    await queryRunner.query(`
      ALTER TABLE access_requests
      ADD CONSTRAINT check_access_request_status
      CHECK (status IN ('ACTIVE', 'DENIED', 'CANCELLED'));
    `);

    // Field presence follows status
    await queryRunner.query(`
      ALTER TABLE access_requests
      ADD CONSTRAINT check_access_request_denial_reason
      CHECK ((status = 'DENIED') = (denial_reason IS NOT NULL));
    `);

    await queryRunner.query(`
      ALTER TABLE access_requests
      ADD CONSTRAINT check_access_request_cancellation
      CHECK ((status = 'CANCELLED') = (cancelled_at IS NOT NULL AND cancellation_reason IS NOT NULL));
    `);

    await queryRunner.query(`
      ALTER TABLE access_requests
      ADD CONSTRAINT check_access_request_module_count
      CHECK (cardinality(module_ids) BETWEEN 1 AND 3);
    `);

    await queryRunner.createForeignKey(
      'access_requests',
      new TableForeignKey({
        columnNames: ['renewed_from_id'],
        referencedTableName: 'access_requests',
        referencedColumnNames: ['id'],
        onDelete: 'RESTRICT',
      }),
    );

    await queryRunner.createIndices('access_requests', [
      new TableIndex({
        name: 'IDX_access_requests_requester_status',
        columnNames: ['requester_id', 'status'],
      }),
      new TableIndex({
        name: 'IDX_access_requests_requested_at',
        columnNames: ['requested_at'],
      }),
      new TableIndex({
        name: 'IDX_access_requests_renewed_from_id',
        columnNames: ['renewed_from_id'],
      }),
    ]);

    await queryRunner.createTable(
      new Table({
        name: 'access_request_history',
        columns: [
          {
            name: 'id',
            type: 'integer',
            isPrimary: true,
            isGenerated: true,
            generationStrategy: 'increment',
          },
          {
            name: 'access_request_id',
            type: 'integer',
            isNullable: false,
          },
          {
            name: 'action',
            type: 'varchar',
            length: '20',
            isNullable: false,
          },
          {
            name: 'description',
            type: 'text',
            isNullable: false,
          },
          {
            name: 'occurred_at',
            type: 'timestamptz',
            isNullable: false,
          },
        ],
      }),
      true,
    );

    await queryRunner.query(`
      ALTER TABLE access_request_history
      ADD CONSTRAINT check_access_history_action
      CHECK (action IN ('CREATED', 'APPROVED', 'DENIED', 'CANCELLED', 'RENEWED'));
    `);

    await queryRunner.createForeignKey(
      'access_request_history',
      new TableForeignKey({
        columnNames: ['access_request_id'],
        referencedTableName: 'access_requests',
        referencedColumnNames: ['id'],
        onDelete: 'RESTRICT',
      }),
    );

    await queryRunner.createIndex(
      'access_request_history',
      new TableIndex({
        name: 'IDX_access_request_history_access_request_id',
        columnNames: ['access_request_id'],
      }),
    );

    await queryRunner.createTable(
      new Table({
        name: 'protocol_sequences',
        columns: [
          {
            name: 'day',
            type: 'varchar',
            length: '8',
            isPrimary: true,
          },
          {
            name: 'last_value',
            type: 'integer',
            isNullable: false,
          },
        ],
      }),
      true,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('protocol_sequences', true);
    await queryRunner.dropTable('access_request_history', true, true, true);
    await queryRunner.dropTable('access_requests', true, true, true);
  }
}
