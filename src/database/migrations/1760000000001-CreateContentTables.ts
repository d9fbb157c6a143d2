import { MigrationInterface, QueryRunner, Table, TableForeignKey, TableIndex } from 'typeorm';

const uuidPrimary = {
  name: 'id',
  type: 'uuid',
  isPrimary: true,
  generationStrategy: 'uuid' as const,
  default: 'uuid_generate_v4()',
};

export class CreateContentTables1760000000001 implements MigrationInterface {
  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(
      `CREATE TYPE "announcements_type_enum" AS ENUM ('general', 'department', 'event', 'urgent')`,
    );

    await queryRunner.createTable(
      new Table({
        name: 'projects',
        columns: [
          uuidPrimary,
          { name: 'title', type: 'varchar', length: '200' },
          { name: 'slug', type: 'varchar', length: '220', isUnique: true },
          { name: 'description', type: 'text' },
          { name: 'image_url', type: 'varchar', length: '500', isNullable: true },
          { name: 'github_url', type: 'varchar', length: '500', default: `''` },
          { name: 'live_url', type: 'varchar', length: '500', default: `''` },
          { name: 'department_id', type: 'uuid', isNullable: true },
          { name: 'created_by_id', type: 'uuid', isNullable: true },
          { name: 'featured', type: 'boolean', default: false },
          { name: 'created_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
          { name: 'updated_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'events',
        columns: [
          uuidPrimary,
          { name: 'title', type: 'varchar', length: '200' },
          { name: 'description', type: 'text' },
          { name: 'event_date', type: 'timestamp' },
          { name: 'location', type: 'varchar', length: '200' },
          { name: 'department_id', type: 'uuid', isNullable: true },
          { name: 'image_url', type: 'varchar', length: '500', isNullable: true },
          { name: 'created_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
          { name: 'updated_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'announcements',
        columns: [
          uuidPrimary,
          { name: 'title', type: 'varchar', length: '200' },
          { name: 'content', type: 'text' },
          { name: 'type', type: 'announcements_type_enum', default: `'general'` },
          { name: 'department_id', type: 'uuid', isNullable: true },
          { name: 'created_by_id', type: 'uuid', isNullable: true },
          { name: 'published', type: 'boolean', default: true },
          { name: 'created_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
          { name: 'updated_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
        ],
      }),
      true,
    );

    await queryRunner.createTable(
      new Table({
        name: 'contact_messages',
        columns: [
          uuidPrimary,
          { name: 'name', type: 'varchar', length: '150' },
          { name: 'email', type: 'varchar', length: '254' },
          { name: 'phone', type: 'varchar', length: '20', default: `''` },
          { name: 'subject', type: 'varchar', length: '200' },
          { name: 'message', type: 'text' },
          { name: 'responded', type: 'boolean', default: false },
          { name: 'created_at', type: 'timestamp', default: 'CURRENT_TIMESTAMP' },
        ],
      }),
      true,
    );

    await queryRunner.createIndices('projects', [
      new TableIndex({ name: 'IDX_projects_featured_created_at', columnNames: ['featured', 'created_at'] }),
      new TableIndex({ name: 'IDX_projects_department_id', columnNames: ['department_id'] }),
    ]);
    await queryRunner.createIndices('events', [
      new TableIndex({ name: 'IDX_events_event_date', columnNames: ['event_date'] }),
      new TableIndex({ name: 'IDX_events_department_id', columnNames: ['department_id'] }),
    ]);
    await queryRunner.createIndex(
      'announcements',
      new TableIndex({
        name: 'IDX_announcements_published_created_at',
        columnNames: ['published', 'created_at'],
      }),
    );
    await queryRunner.createIndex(
      'contact_messages',
      new TableIndex({
        name: 'IDX_contact_messages_responded_created_at',
        columnNames: ['responded', 'created_at'],
      }),
    );

    for (const table of ['projects', 'events', 'announcements']) {
      await queryRunner.createForeignKey(
        table,
        new TableForeignKey({
          columnNames: ['department_id'],
          referencedTableName: 'departments',
          referencedColumnNames: ['id'],
          onDelete: 'SET NULL',
        }),
      );
    }

    for (const table of ['projects', 'announcements']) {
      await queryRunner.createForeignKey(
        table,
        new TableForeignKey({
          columnNames: ['created_by_id'],
          referencedTableName: 'members',
          referencedColumnNames: ['id'],
          onDelete: 'SET NULL',
        }),
      );
    }
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.dropTable('contact_messages', true);
    await queryRunner.dropTable('announcements', true);
    await queryRunner.dropTable('events', true);
    await queryRunner.dropTable('projects', true);
    await queryRunner.query('DROP TYPE IF EXISTS "announcements_type_enum"');
  }
}
