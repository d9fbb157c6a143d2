import { MigrationInterface, QueryRunner, Table, TableForeignKey, TableIndex } from 'typeorm';

export class CreateMembershipSchema1760000000000 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query('CREATE EXTENSION IF NOT EXISTS "uuid-ossp"');
    await queryRunner.query(
      `CREATE TYPE "members_status_enum" AS ENUM ('pending', 'approved', 'rejected')`,
    );

    await queryRunner.createTable(
      new Table({
        name: 'departments',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            generationStrategy: 'uuid',
            default: 'uuid_generate_v4()',
          },
          { name: 'name', type: 'varchar', length: '100', isUnique: true },
          { name: 'slug', type: 'varchar', length: '100', isUnique: true },
          { name: 'description', type: 'text', default: `''` },
          { name: 'leader_id', type: 'uuid', isNullable: true, isUnique: true },
          { name: 'created_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
          { name: 'updated_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'courses',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            generationStrategy: 'uuid',
            default: 'uuid_generate_v4()',
          },
          { name: 'name', type: 'varchar', length: '150', isUnique: true },
          { name: 'code', type: 'varchar', length: '20', isUnique: true, isNullable: true },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'members',
        columns: [
          {
            name: 'id',
            type: 'uuid',
            isPrimary: true,
            generationStrategy: 'uuid',
            default: 'uuid_generate_v4()',
          },
          { name: 'reg_number', type: 'varchar', length: '20', isUnique: true },
          { name: 'email', type: 'varchar', length: '255', isUnique: true },
          { name: 'full_name', type: 'varchar', length: '200' },
          { name: 'password_hash', type: 'varchar', length: '255' },
          { name: 'department_id', type: 'uuid' },
          { name: 'course_id', type: 'uuid', isNullable: true },
          { name: 'course_other', type: 'varchar', length: '150', default: `''` },
          { name: 'status', type: 'members_status_enum', default: `'pending'` },
          { name: 'is_system_admin', type: 'boolean', default: false },
          { name: 'is_active', type: 'boolean', default: true },
          { name: 'registered_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
          { name: 'approved_at', type: 'timestamp', isNullable: true },
          { name: 'rejected_at', type: 'timestamp', isNullable: true },
          { name: 'picture_url', type: 'varchar', length: '500', isNullable: true },
          { name: 'picture_uploaded_at', type: 'timestamp', isNullable: true },
          { name: 'picture_reminder_sent_at', type: 'timestamp', isNullable: true },
          { name: 'updated_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
        ],
        checks: [
          {
            name: 'CHK_members_approved_at',
            expression: `("status" = 'approved') = ("approved_at" IS NOT NULL)`,
          },
        ],
      }),
      true,
    );

    await queryRunner.createIndex(
      'members',
      new TableIndex({
        name: 'IDX_members_status_registered_at',
        columnNames: ['status', 'registered_at'],
      }),
    );

    await queryRunner.createForeignKey(
      'members',
      new TableForeignKey({
        columnNames: ['department_id'],
        referencedTableName: 'departments',
        referencedColumnNames: ['id'],
        onDelete: 'RESTRICT',
      }),
    );

    await queryRunner.createForeignKey(
      'members',
      new TableForeignKey({
        columnNames: ['course_id'],
        referencedTableName: 'courses',
        referencedColumnNames: ['id'],
        onDelete: 'RESTRICT',
      }),
    );

    await queryRunner.createForeignKey(
      'departments',
      new TableForeignKey({
        columnNames: ['leader_id'],
        referencedTableName: 'members',
        referencedColumnNames: ['id'],
        onDelete: 'SET NULL',
      }),
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    const departments = await queryRunner.getTable('departments');
    const leaderFk = departments?.foreignKeys.find((fk) =>
      fk.columnNames.includes('leader_id'),
    );
    if (leaderFk) {
      await queryRunner.dropForeignKey('departments', leaderFk);
    }

    await queryRunner.dropTable('members', true);
    await queryRunner.dropTable('courses', true);
    await queryRunner.dropTable('departments', true);
    await queryRunner.query('DROP TYPE IF EXISTS "members_status_enum"');
  }
}
