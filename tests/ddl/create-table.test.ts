import { describe, expect, it } from 'vitest';
import {
  generateCreateTable,
  generateCreateTableSql,
  generateDropTable
} from '../../src/core/ddl/table/schema-generator.js';
import { col, defineTableDesign, foreignKey, index, type ColumnDesign, type TableDesignInit } from '../../src/core/ddl/table/table-design.js';
import { validateTableDesign } from '../../src/core/ddl/table/table-validator.js';
import { describeTableError } from '../../src/core/ddl/ddl-errors.js';

const users = defineTableDesign(
  'users',
  'postgres',
  [
    col.with(col.integer('id'), col.primaryKey, col.autoIncrement),
    col.with(col.varchar('email', 255), col.notNull, col.unique),
    col.default(col.boolean('active'), 'true'),
    col.timestamp('created_at')
  ],
  { indexes: [index('idx_users_created', ['created_at'])], comment: 'App users' }
);

describe('generateCreateTableSql', () => {
  it('renders a PostgreSQL table with indexes and comments', () => {
    const result = generateCreateTableSql(users);

    expect(result).toEqual({
      ok: true,
      value: {
        tableSql: [
          'CREATE TABLE "users" (',
          '  "id" SERIAL NOT NULL PRIMARY KEY,',
          '  "email" VARCHAR(255) NOT NULL CONSTRAINT "users_email_unique" UNIQUE,',
          '  "active" BOOLEAN DEFAULT true,',
          '  "created_at" TIMESTAMP',
          ');'
        ].join('\n'),
        indexSql: ['CREATE INDEX "idx_users_created" ON "users" ("created_at");'],
        commentSql: [`COMMENT ON TABLE "users" IS 'App users';`]
      }
    });
  });

  it('renders composite keys as a table constraint and foreign keys after the columns', () => {
    const table = defineTableDesign(
      'order_items',
      'mysql',
      [col.primaryKey(col.integer('order_id')), col.primaryKey(col.integer('line_no')), col.notNull(col.integer('qty'))],
      {
        foreignKeys: [foreignKey(['order_id'], 'orders', ['id'], { name: 'fk_items_order', onDelete: 'CASCADE' })],
        options: { mysql: { engine: 'InnoDB' } }
      }
    );

    const result = generateCreateTableSql(table);

    expect(result.ok && result.value.tableSql).toBe(
      [
        'CREATE TABLE `order_items` (',
        '  `order_id` INTEGER NOT NULL,',
        '  `line_no` INTEGER NOT NULL,',
        '  `qty` INTEGER NOT NULL,',
        '  PRIMARY KEY (`order_id`, `line_no`),',
        '  CONSTRAINT `fk_items_order` FOREIGN KEY (`order_id`) REFERENCES `orders` (`id`) ON DELETE CASCADE',
        ') ENGINE=InnoDB;'
      ].join('\n')
    );
  });

  it('renders SQLite AUTOINCREMENT on the inline key and table options', () => {
    const table = defineTableDesign('notes', 'sqlite', [col.with(col.integer('id'), col.primaryKey, col.autoIncrement), col.text('body')], {
      options: { sqlite: { strict: true } }
    });

    const result = generateCreateTableSql(table);

    expect(result.ok && result.value.tableSql).toBe(
      ['CREATE TABLE "notes" (', '  "id" INTEGER NOT NULL PRIMARY KEY AUTOINCREMENT,', '  "body" TEXT', ') STRICT;'].join('\n')
    );
  });

  it('renders SQL Server computed columns', () => {
    const table = defineTableDesign(
      'lines',
      'mssql',
      [
        col.with(col.integer('id'), col.primaryKey, col.autoIncrement),
        col.decimal('price', 10, 2),
        col.integer('qty'),
        col.generated(col.decimal('total', 12, 2), 'price * qty')
      ],
      { schema: 'dbo' }
    );

    const result = generateCreateTableSql(table);

    expect(result.ok && result.value.tableSql).toBe(
      [
        'CREATE TABLE [dbo].[lines] (',
        '  [id] INTEGER NOT NULL PRIMARY KEY IDENTITY(1,1),',
        '  [price] DECIMAL(10, 2),',
        '  [qty] INTEGER,',
        '  [total] AS (price * qty) PERSISTED',
        ');'
      ].join('\n')
    );
  });

  it('renders MySQL column comments inline', () => {
    const table = defineTableDesign('profiles', 'mysql', [col.comment(col.text('bio'), "User's bio")]);
    const result = generateCreateTableSql(table);
    expect(result.ok && result.value.tableSql).toBe("CREATE TABLE `profiles` (\n  `bio` TEXT COMMENT 'User''s bio'\n);");
  });

  it('joins the full script with blank lines', () => {
    const result = generateCreateTable(users);
    expect(result.ok && result.value.split('\n\n')).toHaveLength(3);
  });

  it('validates before rendering', () => {
    const table = defineTableDesign('posts', 'postgres', [col.integer('id')], { indexes: [index('idx_posts_title', ['title'])] });
    expect(generateCreateTableSql(table)).toEqual({
      ok: false,
      error: { kind: 'UnknownIndexColumn', index: 'idx_posts_title', column: 'title' }
    });
  });
});

describe('validateTableDesign', () => {
  const errorOf = (name: string, columns: ColumnDesign[], init: TableDesignInit = {}) => {
    const result = validateTableDesign(defineTableDesign(name, 'postgres', columns, init));
    return result.ok ? undefined : result.error;
  };

  it('reports each error', () => {
    expect(errorOf(' ', [col.integer('id')])).toEqual({ kind: 'EmptyTableName' });
    expect(errorOf('t', [])).toEqual({ kind: 'NoColumns' });
    expect(errorOf('t', [col.integer('id'), col.integer('')])).toEqual({ kind: 'EmptyColumnName', position: 1 });
    expect(errorOf('t', [col.custom('id', ' ')])).toEqual({ kind: 'EmptyColumnType', column: 'id' });
    expect(errorOf('t', [col.text('email'), col.text('Email')])).toEqual({ kind: 'DuplicateColumn', column: 'Email' });
    expect(errorOf('t', [col.integer('id')], { foreignKeys: [foreignKey(['author_id'], 'users', ['id'])] })).toEqual({
      kind: 'UnknownForeignKeyColumn',
      foreignKey: 'author_id',
      column: 'author_id'
    });
    expect(errorOf('t', [col.integer('a'), col.generated(col.integer('b'), 'a * 2', false)])).toEqual({
      kind: 'VirtualGeneratedNotSupported',
      column: 'b'
    });
  });

  it('accepts virtual generated columns where the dialect has them', () => {
    const table = defineTableDesign('t', 'mysql', [col.integer('a'), col.generated(col.integer('b'), 'a * 2', false)]);
    expect(validateTableDesign(table).ok).toBe(true);
  });

  it('describes errors', () => {
    expect(describeTableError({ kind: 'DuplicateColumn', column: 'Email' })).toBe('Duplicate column name "Email"');
  });
});

describe('generateDropTable', () => {
  it('drops with IF EXISTS by default', () => {
    expect(generateDropTable('postgres', 'users')).toEqual(['DROP TABLE IF EXISTS "users";']);
    expect(generateDropTable('mssql', 'users', { schema: 'dbo', ifExists: false })).toEqual(['DROP TABLE [dbo].[users];']);
  });
});
