import { describe, expect, it } from 'vitest';
import { TriggerManager } from '../../src/core/ddl/trigger/trigger-manager.js';
import { TriggerSpec } from '../../src/core/ddl/trigger/trigger-spec.js';
import { validateTrigger } from '../../src/core/ddl/trigger/trigger-validator.js';
import { describeTriggerError, type TriggerError } from '../../src/core/ddl/ddl-errors.js';
import type { DialectName } from '../../src/core/ddl/schema-dialect.js';

describe('TriggerManager', () => {
  it('builds a PostgreSQL trigger with update columns and a WHEN condition', () => {
    const spec = TriggerSpec.create('audit_users', 'users')
      .withTiming('BEFORE')
      .withEvents(['INSERT', 'UPDATE'])
      .withUpdateColumns(['email', 'status'])
      .withWhen('NEW.status IS DISTINCT FROM OLD.status')
      .withFunction('audit.log_change');

    const result = new TriggerManager('postgres').buildCreateTrigger(spec);

    expect(result.ok && result.value).toBe(
      [
        'CREATE TRIGGER audit_users',
        '    BEFORE INSERT OR UPDATE OF email, status',
        '    ON users',
        '    FOR EACH ROW',
        '    WHEN (NEW.status IS DISTINCT FROM OLD.status)',
        '    EXECUTE FUNCTION audit.log_change()'
      ].join('\n')
    );
  });

  it('builds statement-level TRUNCATE triggers on PostgreSQL', () => {
    const spec = TriggerSpec.create('no_truncate', 'ledger')
      .withSchema('finance')
      .withEvent('TRUNCATE')
      .withLevel('STATEMENT')
      .withFunction('reject_truncate');

    const result = new TriggerManager('postgres').buildCreateTrigger(spec);

    expect(result.ok && result.value).toBe(
      [
        'CREATE TRIGGER no_truncate',
        '    AFTER TRUNCATE',
        '    ON finance.ledger',
        '    FOR EACH STATEMENT',
        '    EXECUTE FUNCTION reject_truncate()'
      ].join('\n')
    );
  });

  it('builds a MySQL trigger with an inline body', () => {
    const spec = TriggerSpec.create('orders_bi', 'orders').withTiming('BEFORE').withBody('SET NEW.created_at = NOW();');

    const result = new TriggerManager('mysql').buildCreateTrigger(spec);

    expect(result.ok && result.value).toBe(
      ['CREATE TRIGGER orders_bi', 'BEFORE INSERT ON orders', 'FOR EACH ROW', 'BEGIN', 'SET NEW.created_at = NOW();', 'END'].join('\n')
    );
  });

  it('builds a SQLite trigger with UPDATE OF and WHEN', () => {
    const spec = TriggerSpec.create('touch', 'notes')
      .withEvent('UPDATE')
      .withUpdateColumns(['body'])
      .withWhen('NEW.body <> OLD.body')
      .withBody('UPDATE notes SET updated_at = CURRENT_TIMESTAMP WHERE id = NEW.id;');

    const result = new TriggerManager('sqlite').buildCreateTrigger(spec);

    expect(result.ok && result.value).toBe(
      [
        'CREATE TRIGGER touch',
        '    AFTER UPDATE OF body',
        '    ON notes',
        '    FOR EACH ROW',
        '    WHEN NEW.body <> OLD.body',
        'BEGIN',
        'UPDATE notes SET updated_at = CURRENT_TIMESTAMP WHERE id = NEW.id;',
        'END'
      ].join('\n')
    );
  });

  it('builds a SQL Server trigger for several events', () => {
    const spec = TriggerSpec.create('trg_orders_audit', 'orders')
      .withSchema('dbo')
      .withEvents(['INSERT', 'DELETE'])
      .withBody('INSERT INTO audit_log (action) VALUES (1);');

    const result = new TriggerManager('mssql').buildCreateTrigger(spec);

    expect(result.ok && result.value).toBe(
      [
        'CREATE TRIGGER dbo.trg_orders_audit',
        '    ON dbo.orders',
        '    AFTER INSERT, DELETE',
        'AS',
        'BEGIN',
        'INSERT INTO audit_log (action) VALUES (1);',
        'END'
      ].join('\n')
    );
  });

  it('rejects BEFORE triggers on SQL Server', () => {
    const spec = TriggerSpec.create('trg', 'orders').withTiming('BEFORE').withBody('SELECT 1;');
    expect(new TriggerManager('mssql').validate(spec)).toEqual({ ok: false, error: { kind: 'BeforeNotSupported' } });
  });

  it('has a minimal failing spec for every error', () => {
    const base = TriggerSpec.create('trg', 'orders');
    const cases: Array<[DialectName, TriggerSpec, TriggerError['kind']]> = [
      ['postgres', TriggerSpec.create('', 'orders').withFunction('fn'), 'EmptyName'],
      ['postgres', TriggerSpec.create('trg', '').withFunction('fn'), 'EmptyTable'],
      ['postgres', base.withEvents([]).withFunction('fn'), 'NoEvents'],
      ['mssql', base.withTiming('BEFORE').withBody('x'), 'BeforeNotSupported'],
      ['mysql', base.withTiming('INSTEAD OF').withBody('x'), 'InsteadOfNotSupported'],
      ['mysql', base.withEvent('TRUNCATE').withBody('x'), 'TruncateNotSupported'],
      ['mysql', base.withLevel('STATEMENT').withBody('x'), 'StatementLevelNotSupported'],
      ['mysql', base.withWhen('NEW.id > 0').withBody('x'), 'WhenConditionNotSupported'],
      ['mssql', base.withEvent('UPDATE').withUpdateColumns(['total']).withBody('x'), 'UpdateColumnsNotSupported'],
      ['postgres', base, 'MissingFunction'],
      ['mysql', base, 'MissingBody'],
      ['sqlite', base.withEvents(['INSERT', 'DELETE']).withBody('x'), 'MultipleEventsNotSupported']
    ];

    for (const [dialect, spec, kind] of cases) {
      expect(validateTrigger(spec, dialect)).toEqual({ ok: false, error: { kind } });
    }
    expect(validateTrigger(base.withFunction('fn'), 'postgres').ok).toBe(true);
  });

  it('adds the comment statement on PostgreSQL only', () => {
    const spec = TriggerSpec.create('audit_users', 'users').withFunction('log_change').withBody('x').withComment('Audit trail');

    const pg = new TriggerManager('postgres').buildCreateStatements(spec);
    expect(pg.ok && pg.value[1]).toBe("COMMENT ON TRIGGER audit_users ON users IS 'Audit trail'");

    const mysql = new TriggerManager('mysql').buildCreateStatements(spec);
    expect(mysql.ok && mysql.value.length).toBe(1);
  });

  it('builds drop statements per dialect', () => {
    expect(new TriggerManager('postgres').buildDropTrigger({ name: 'audit_users', table: 'users' }, true)).toEqual({
      ok: true,
      value: 'DROP TRIGGER IF EXISTS audit_users ON users'
    });
    expect(new TriggerManager('mysql').buildDropTrigger({ name: 'orders_bi', table: 'orders', schema: 'shop' })).toEqual({
      ok: true,
      value: 'DROP TRIGGER shop.orders_bi'
    });
    expect(new TriggerManager('sqlite').buildDropTrigger({ name: 'touch', table: 'notes' }, true)).toEqual({
      ok: true,
      value: 'DROP TRIGGER IF EXISTS touch'
    });
    expect(new TriggerManager('mssql').buildDropTrigger({ name: 'trg', table: 'orders', schema: 'dbo' }, true)).toEqual({
      ok: true,
      value: "IF OBJECT_ID('dbo.trg', 'TR') IS NOT NULL DROP TRIGGER dbo.trg"
    });
    expect(new TriggerManager('postgres').buildDropTrigger({ name: '', table: 'users' })).toEqual({
      ok: false,
      error: { kind: 'EmptyName' }
    });
  });

  it('enables and disables triggers where the dialect can', () => {
    const target = { name: 'audit_users', table: 'users' };
    expect(new TriggerManager('postgres').buildDisableTrigger(target)).toBe('ALTER TABLE users DISABLE TRIGGER audit_users');
    expect(new TriggerManager('mssql').buildEnableTrigger(target)).toBe('ENABLE TRIGGER audit_users ON users');
    expect(new TriggerManager('mysql').buildEnableTrigger(target)).toBeUndefined();
    expect(new TriggerManager('postgres').buildCommentOnTrigger(target)).toBe('COMMENT ON TRIGGER audit_users ON users IS NULL');
    expect(new TriggerManager('sqlite').buildCommentOnTrigger(target, 'x')).toBeUndefined();
  });

  it('keeps events distinct', () => {
    const spec = TriggerSpec.create('t', 'orders').withEvents(['INSERT', 'INSERT', 'UPDATE']).addEvent('UPDATE');
    expect(spec.events).toEqual(['INSERT', 'UPDATE']);
    expect(TriggerSpec.create('t', 'orders').events).toEqual(['INSERT']);
  });

  it('describes errors', () => {
    expect(describeTriggerError({ kind: 'MultipleEventsNotSupported' })).toBe('This dialect allows a single event per trigger');
  });
});
