import { describe, expect, it } from 'vitest';
import { SchemaComparator } from '../../src/core/ddl/compare/schema-comparator.js';
import { createSchemaDiff } from '../../src/core/ddl/compare/schema-diff.js';
import type { ColumnInfo, SchemaSnapshot, TableDetails } from '../../src/core/ddl/compare/schema-types.js';
import type { DbExecutor, QueryResult } from '../../src/core/execution/db-executor.js';
import { executeMigration } from '../../src/core/ddl/migration/migration-executor.js';
import { generateMigration, renderMigrationScript } from '../../src/core/ddl/migration/migration-generator.js';
import { tableDesignFromDetails } from '../../src/core/ddl/migration/table-migration.js';

const column = (name: string, ordinal: number, extra: Partial<ColumnInfo> = {}): ColumnInfo => ({
  name,
  ordinal,
  dataType: 'integer',
  nullable: true,
  isPrimaryKey: false,
  isAutoIncrement: false,
  isUnique: false,
  ...extra
});

const details = (name: string, columns: ColumnInfo[], extra: Partial<TableDetails> = {}): TableDetails => ({
  info: { name },
  columns,
  foreignKeys: [],
  indexes: [],
  constraints: [],
  triggers: [],
  ...extra
});

const snapshot = (tables: TableDetails[], extra: Partial<SchemaSnapshot> = {}): SchemaSnapshot => ({
  tables: tables.map(table => table.info),
  tableDetails: new Map(tables.map(table => [table.info.name, table] as const)),
  views: [],
  functions: [],
  procedures: [],
  triggers: [],
  sequences: [],
  types: [],
  ...extra
});

class RecordingExecutor implements DbExecutor {
  readonly log: string[] = [];

  async executeSql(sql: string): Promise<QueryResult[]> {
    this.log.push(sql);
    return [{ columns: [], values: [] }];
  }
}

const usersV1 = details('users', [
  column('id', 1, { nullable: false, isPrimaryKey: true }),
  column('email', 2, { dataType: 'varchar', maxLength: 255 })
], { primaryKey: { name: 'users_pkey', columns: ['id'] } });

const usersV2 = details('users', [
  column('id', 1, { nullable: false, isPrimaryKey: true }),
  column('email', 2, { dataType: 'varchar', maxLength: 320, nullable: false }),
  column('created_at', 3, { dataType: 'timestamp' })
], {
  primaryKey: { name: 'users_pkey', columns: ['id'] },
  indexes: [{ name: 'idx_users_email', columns: ['email'], isUnique: true, isPrimary: false, indexType: 'btree' }]
});

const posts = details('posts', [column('id', 1), column('author_id', 2)], {
  foreignKeys: [
    { name: 'fk_posts_author', columns: ['author_id'], referencedTable: 'users', referencedColumns: ['id'], onUpdate: 'NO ACTION', onDelete: 'NO ACTION' }
  ]
});

const auditLog = details('audit_log', [
  column('id', 1, { dataType: 'bigint', nullable: false, isPrimaryKey: true, isAutoIncrement: true, defaultValue: "nextval('audit_log_id_seq')" }),
  column('note', 2, { dataType: 'text' })
], { primaryKey: { name: 'audit_log_pkey', columns: ['id'] } });

const desired = snapshot([usersV2, auditLog]);
const current = snapshot([usersV1, posts]);
const tableDiff = new SchemaComparator().compareSchemas(desired, current);

const createPosts =
  'CREATE TABLE "posts" (\n  "id" integer,\n  "author_id" integer,\n  CONSTRAINT "fk_posts_author" FOREIGN KEY ("author_id") REFERENCES "users" ("id")\n);';
const createAuditLog = 'CREATE TABLE "audit_log" (\n  "id" BIGSERIAL NOT NULL PRIMARY KEY,\n  "note" text\n);';

describe('tableDesignFromDetails', () => {
  it('rebuilds columns, keys and foreign keys from introspected details', () => {
    const design = tableDesignFromDetails(auditLog, 'postgres');

    expect(design.columns.map(col => [col.name, col.dataType, col.nullable, col.isPrimaryKey])).toEqual([
      ['id', 'bigint', false, true],
      ['note', 'text', true, false]
    ]);
    expect(design.columns[0].defaultValue).toBeUndefined();
    expect(tableDesignFromDetails(posts, 'postgres').foreignKeys[0]).toEqual({
      name: 'fk_posts_author',
      columns: ['author_id'],
      referencedTable: 'users',
      referencedSchema: undefined,
      referencedColumns: ['id'],
      onUpdate: 'NO ACTION',
      onDelete: 'NO ACTION'
    });
  });

  it('keeps string lengths and numeric precision', () => {
    const design = tableDesignFromDetails(
      details('prices', [
        column('code', 1, { dataType: 'varchar', maxLength: 12 }),
        column('amount', 2, { dataType: 'numeric', precision: 10, scale: 2 })
      ]),
      'postgres'
    );

    expect(design.columns.map(col => [col.length, col.scale])).toEqual([
      [12, undefined],
      [10, 2]
    ]);
  });
});

describe('generateMigration', () => {
  it('drops, creates and alters tables on PostgreSQL', () => {
    const migration = generateMigration(tableDiff, 'postgres', { desired, current });

    expect(migration.warnings).toEqual([]);
    expect(migration.steps.map(step => step.kind)).toEqual(['dropTable', 'createTable', 'addColumn', 'alterColumn', 'addIndex']);
    expect(migration.up).toEqual([
      'DROP TABLE IF EXISTS "posts";',
      createAuditLog,
      'ALTER TABLE "users" ADD COLUMN "created_at" timestamp;',
      'ALTER TABLE "users" ALTER COLUMN "email" TYPE varchar(320);',
      'ALTER TABLE "users" ALTER COLUMN "email" SET NOT NULL;',
      'CREATE UNIQUE INDEX "idx_users_email" ON "users" ("email");'
    ]);
    expect(migration.down).toEqual([
      'DROP INDEX IF EXISTS "idx_users_email";',
      'ALTER TABLE "users" ALTER COLUMN "email" TYPE varchar(255);',
      'ALTER TABLE "users" ALTER COLUMN "email" DROP NOT NULL;',
      'ALTER TABLE "users" DROP COLUMN "created_at";',
      'DROP TABLE IF EXISTS "audit_log";',
      createPosts
    ]);
  });

  it('marks steps that can lose data or reject rows', () => {
    const { steps } = generateMigration(tableDiff, 'postgres', { desired, current });

    expect(steps.map(step => [step.kind, step.safe, step.downSafe])).toEqual([
      ['dropTable', false, true],
      ['createTable', true, false],
      ['addColumn', true, false],
      ['alterColumn', false, true],
      ['addIndex', true, false]
    ]);
  });

  it('renders MySQL statements with the MySQL dialect', () => {
    const migration = generateMigration(tableDiff, 'mysql', { desired, current, ifExists: false });

    expect(migration.up[0]).toBe('DROP TABLE `posts`;');
    expect(migration.up.slice(2)).toEqual([
      'ALTER TABLE `users` ADD COLUMN `created_at` timestamp;',
      'ALTER TABLE `users` MODIFY COLUMN `email` varchar(320) NOT NULL;',
      'CREATE UNIQUE INDEX `idx_users_email` ON `users` (`email`);'
    ]);
  });

  it('reports SQLite column changes as comments that the executor skips', () => {
    const migration = generateMigration(tableDiff, 'sqlite', { desired, current });

    expect(migration.steps[3].up).toEqual([
      '-- SQLite cannot alter the type/nullability of column "email" on "users"; recreate the table to apply it'
    ]);
  });

  it('adds CASCADE to drops only where the dialect has it', () => {
    expect(generateMigration(tableDiff, 'postgres', { desired, current, cascade: true }).up[0]).toBe(
      'DROP TABLE IF EXISTS "posts" CASCADE;'
    );
    expect(generateMigration(tableDiff, 'sqlite', { desired, current, cascade: true }).up[0]).toBe('DROP TABLE IF EXISTS "posts";');
  });

  it('starts each step with a comment when asked', () => {
    const desiredUsers = snapshot([
      details('users', [...usersV1.columns, column('note', 3, { dataType: 'text' })], { primaryKey: usersV1.primaryKey })
    ]);
    const currentUsers = snapshot([usersV1]);
    const diff = new SchemaComparator().compareSchemas(desiredUsers, currentUsers);

    const migration = generateMigration(diff, 'postgres', { desired: desiredUsers, current: currentUsers, includeComments: true });

    expect(migration.steps[0].up).toEqual(['-- Add column note to users', 'ALTER TABLE "users" ADD COLUMN "note" text;']);
    expect(migration.down).toEqual(['-- Revert: Add column note to users', 'ALTER TABLE "users" DROP COLUMN "note";']);
  });

  it('warns instead of guessing when snapshots are missing', () => {
    const migration = generateMigration(tableDiff, 'postgres');

    expect(migration.warnings).toEqual([
      'Table audit_log has no details in the desired snapshot and cannot be created',
      'Table posts has no details in the current snapshot; the down script cannot recreate it',
      'Column users.email changed but the snapshots lack its definition; the change is not migrated'
    ]);
    expect(migration.steps.map(step => step.kind)).toEqual(['dropTable', 'addColumn', 'addIndex']);
    expect(migration.down).toEqual(['DROP INDEX IF EXISTS "idx_users_email";', 'ALTER TABLE "users" DROP COLUMN "created_at";']);
  });

  it('drops and re-adds changed foreign keys around the column changes', () => {
    const changed = details('posts', posts.columns, {
      foreignKeys: [{ ...posts.foreignKeys[0], onDelete: 'CASCADE' }]
    });
    const diff = new SchemaComparator().compareSchemas(snapshot([changed]), snapshot([posts]));

    const migration = generateMigration(diff, 'postgres', { desired: snapshot([changed]), current: snapshot([posts]) });

    expect(migration.up).toEqual([
      'ALTER TABLE "posts" DROP CONSTRAINT "fk_posts_author";',
      'ALTER TABLE "posts" ADD CONSTRAINT "fk_posts_author" FOREIGN KEY ("author_id") REFERENCES "users" ("id") ON DELETE CASCADE;'
    ]);
    expect(migration.down).toEqual([
      'ALTER TABLE "posts" DROP CONSTRAINT "fk_posts_author";',
      'ALTER TABLE "posts" ADD CONSTRAINT "fk_posts_author" FOREIGN KEY ("author_id") REFERENCES "users" ("id");'
    ]);
  });

  it('migrates primary keys and check constraints', () => {
    const before = details('items', [column('id', 1, { nullable: false }), column('qty', 2)], {
      constraints: [{ name: 'chk_qty', constraintType: 'CHECK', columns: ['qty'], definition: 'qty > 0' }]
    });
    const after = details('items', before.columns, {
      primaryKey: { name: 'items_pkey', columns: ['id'] },
      constraints: [{ name: 'chk_qty', constraintType: 'CHECK', columns: ['qty'], definition: 'qty >= 0' }]
    });
    const diff = new SchemaComparator().compareSchemas(snapshot([after]), snapshot([before]));

    const migration = generateMigration(diff, 'postgres', { desired: snapshot([after]), current: snapshot([before]) });

    expect(migration.up).toEqual([
      'ALTER TABLE "items" DROP CONSTRAINT "chk_qty";',
      'ALTER TABLE "items" ADD CONSTRAINT "items_pkey" PRIMARY KEY ("id");',
      'ALTER TABLE "items" ADD CONSTRAINT "chk_qty" CHECK (qty >= 0);'
    ]);
    expect(migration.down).toEqual([
      'ALTER TABLE "items" DROP CONSTRAINT "chk_qty";',
      'ALTER TABLE "items" DROP CONSTRAINT "items_pkey";',
      'ALTER TABLE "items" ADD CONSTRAINT "chk_qty" CHECK (qty > 0);'
    ]);
  });

  it('orders schema objects so dependents are dropped first and created last', () => {
    const diff = createSchemaDiff();
    diff.views.removed.push({ name: 'old_report', isMaterialized: true, definition: 'SELECT 1' });
    diff.types.added.push({ name: 'mood', typeKind: 'enum', values: ['sad', 'happy'] });
    diff.types.modified.push({
      name: 'status',
      valuesChange: { current: ['open', 'closed'], desired: ['draft', 'open', 'review', 'closed'] }
    });
    diff.sequences.added.push({ name: 'order_seq', dataType: 'bigint', startValue: 1, incrementBy: 1 });
    diff.sequences.modified.push({
      name: 'invoice_seq',
      incrementChange: { current: 1, desired: 10 },
      maxValueChange: { current: undefined, desired: 1000 }
    });
    diff.functions.added.push({
      name: 'add_one',
      language: 'sql',
      returnType: 'integer',
      parameters: ['x integer'],
      definition: 'SELECT x + 1'
    });
    diff.views.modified.push({
      name: 'active_users',
      definitionChange: { current: 'SELECT id FROM users', desired: 'SELECT id, email FROM users' }
    });
    diff.triggers.added.push({
      name: 'users_audit',
      tableName: 'users',
      timing: 'AFTER',
      events: ['INSERT', 'UPDATE'],
      forEach: 'ROW',
      definition: 'EXECUTE FUNCTION audit()',
      enabled: false
    });
    diff.triggers.modified.push({ name: 'orders_touch', tableName: 'orders', enabledChange: { current: false, desired: true } });

    const migration = generateMigration(diff, 'postgres');

    expect(migration.steps.map(step => step.kind)).toEqual([
      'dropView',
      'createType',
      'alterType',
      'createSequence',
      'alterSequence',
      'createFunction',
      'alterView',
      'createTrigger',
      'alterTrigger'
    ]);
    expect(migration.up).toEqual([
      'DROP MATERIALIZED VIEW IF EXISTS "old_report";',
      `CREATE TYPE "mood" AS ENUM ('sad', 'happy');`,
      `ALTER TYPE "status" ADD VALUE 'draft' BEFORE 'open';`,
      `ALTER TYPE "status" ADD VALUE 'review' AFTER 'open';`,
      'CREATE SEQUENCE "order_seq" AS bigint START WITH 1 INCREMENT BY 1;',
      'ALTER SEQUENCE "invoice_seq" INCREMENT BY 10 MAXVALUE 1000;',
      'CREATE FUNCTION "add_one"(x integer) RETURNS integer LANGUAGE sql AS $$SELECT x + 1$$;',
      'CREATE OR REPLACE VIEW "active_users" AS SELECT id, email FROM users;',
      'CREATE TRIGGER users_audit AFTER INSERT OR UPDATE ON users FOR EACH ROW EXECUTE FUNCTION audit();',
      'ALTER TABLE users DISABLE TRIGGER users_audit;',
      'ALTER TABLE orders ENABLE TRIGGER orders_touch;'
    ]);
    expect(migration.down).toEqual([
      'ALTER TABLE orders DISABLE TRIGGER orders_touch;',
      'DROP TRIGGER IF EXISTS users_audit ON users;',
      'CREATE OR REPLACE VIEW "active_users" AS SELECT id FROM users;',
      'DROP FUNCTION IF EXISTS "add_one"(x integer);',
      'ALTER SEQUENCE "invoice_seq" INCREMENT BY 1 NO MAXVALUE;',
      'DROP SEQUENCE IF EXISTS "order_seq";',
      'DROP TYPE IF EXISTS "mood";',
      'CREATE MATERIALIZED VIEW "old_report" AS SELECT 1;'
    ]);
    expect(migration.warnings).toEqual(['Type status gains enum values; the down script cannot remove them']);
  });

  it('warns about objects the dialect cannot hold', () => {
    const diff = createSchemaDiff();
    diff.types.added.push({ name: 'mood', typeKind: 'enum', values: ['sad'] });
    diff.sequences.added.push({ name: 'order_seq', dataType: 'bigint', startValue: 1, incrementBy: 1 });
    diff.functions.added.push({ name: 'f', language: 'sql', returnType: 'integer', parameters: [], definition: 'SELECT 1' });

    const migration = generateMigration(diff, 'sqlite');

    expect(migration.steps).toEqual([]);
    expect(migration.warnings).toEqual([
      'Type mood is not migrated: sqlite has no user-defined types',
      'Sequence order_seq is not migrated: sqlite has no sequences',
      'Function f cannot be created: SQLite has no stored routines'
    ]);
  });

  it('alters SQL Server routines in place', () => {
    const taxV1 = { name: 'tax', language: 'tsql', returnType: 'INT', parameters: ['@x INT'], definition: 'BEGIN RETURN @x END' };
    const taxV2 = { ...taxV1, definition: 'BEGIN RETURN @x * 2 END' };
    const diff = createSchemaDiff();
    diff.functions.modified.push({ name: 'tax', definitionChange: { current: taxV1.definition, desired: taxV2.definition } });

    const migration = generateMigration(diff, 'mssql', {
      desired: snapshot([], { functions: [taxV2] }),
      current: snapshot([], { functions: [taxV1] })
    });

    expect(migration.up).toEqual(['CREATE OR ALTER FUNCTION [tax](@x INT) RETURNS INT\nAS\nBEGIN RETURN @x * 2 END;']);
    expect(migration.down).toEqual(['CREATE OR ALTER FUNCTION [tax](@x INT) RETURNS INT\nAS\nBEGIN RETURN @x END;']);
  });

  it('recreates MySQL routines, which have no CREATE OR REPLACE', () => {
    const v1 = { name: 'add_one', language: 'sql', returnType: 'INT', parameters: ['x INT'], definition: 'RETURN x + 1' };
    const v2 = { ...v1, definition: 'RETURN x + 2' };
    const diff = createSchemaDiff();
    diff.functions.modified.push({ name: 'add_one', definitionChange: { current: v1.definition, desired: v2.definition } });

    const migration = generateMigration(diff, 'mysql', {
      desired: snapshot([], { functions: [v2] }),
      current: snapshot([], { functions: [v1] })
    });

    expect(migration.up).toEqual(['DROP FUNCTION IF EXISTS `add_one`;', 'CREATE FUNCTION `add_one`(x INT) RETURNS INT\nRETURN x + 2;']);
  });

  it('joins a script with blank lines', () => {
    expect(renderMigrationScript(['SELECT 1;', 'SELECT 2;'])).toBe('SELECT 1;\n\nSELECT 2;');
  });
});

describe('executeMigration', () => {
  it('skips unsafe steps unless destructive changes are allowed', async () => {
    const migration = generateMigration(tableDiff, 'postgres', { desired, current });
    const executor = new RecordingExecutor();

    const executed = await executeMigration(executor, migration);

    expect(executed).toEqual([
      createAuditLog,
      'ALTER TABLE "users" ADD COLUMN "created_at" timestamp;',
      'CREATE UNIQUE INDEX "idx_users_email" ON "users" ("email");'
    ]);
    expect(executor.log).toEqual(executed);
  });

  it('runs the down script in reverse with its own safety flags', async () => {
    const migration = generateMigration(tableDiff, 'postgres', { desired, current });

    const executed = await executeMigration(new RecordingExecutor(), migration, { direction: 'down' });

    expect(executed).toEqual([
      'ALTER TABLE "users" ALTER COLUMN "email" TYPE varchar(255);',
      'ALTER TABLE "users" ALTER COLUMN "email" DROP NOT NULL;',
      createPosts
    ]);
  });

  it('runs every step when destructive changes are allowed', async () => {
    const migration = generateMigration(tableDiff, 'postgres', { desired, current });

    const executed = await executeMigration(new RecordingExecutor(), migration, { allowDestructive: true });

    expect(executed).toEqual(migration.up);
  });
});
