import { describe, expect, it } from 'vitest';
import {
  createDelimitingQuoter,
  createQuoter,
  delimitIdentifier,
  isReservedKeyword,
  needsQuoting,
  quoteIdentifier,
  quoteQualifiedName,
  unquoteIdentifier
} from './identifier-quoter.js';
import { SUPPORTED_DIALECTS, type DialectName } from './schema-dialect.js';

const dialects: DialectName[] = Object.values(SUPPORTED_DIALECTS);

describe('identifier quoting', () => {
  it('quotes reserved words with each dialect delimiter', () => {
    expect(quoteIdentifier('postgres', 'select')).toBe('"select"');
    expect(quoteIdentifier('sqlite', 'select')).toBe('"select"');
    expect(quoteIdentifier('mysql', 'select')).toBe('`select`');
    expect(quoteIdentifier('mssql', 'select')).toBe('[select]');
  });

  it('leaves plain identifiers bare', () => {
    for (const dialect of dialects) {
      expect(quoteIdentifier(dialect, 'user_id')).toBe('user_id');
      expect(quoteIdentifier(dialect, '_private2')).toBe('_private2');
    }
  });

  it('quotes names that are not plain identifiers', () => {
    expect(needsQuoting('2fa_codes')).toBe(true);
    expect(needsQuoting('order items')).toBe(true);
    expect(needsQuoting('naïve')).toBe(true);
    expect(needsQuoting('')).toBe(true);
    expect(quoteIdentifier('postgres', 'order items')).toBe('"order items"');
  });

  it('matches reserved words case-insensitively', () => {
    expect(isReservedKeyword('Select')).toBe(true);
    expect(isReservedKeyword('USER')).toBe(true);
    expect(isReservedKeyword('users')).toBe(false);
    expect(quoteIdentifier('postgres', 'Table')).toBe('"Table"');
  });

  it('doubles the closing delimiter inside a name', () => {
    expect(delimitIdentifier('postgres', 'say "hi"')).toBe('"say ""hi"""');
    expect(delimitIdentifier('mysql', 'back`tick')).toBe('`back``tick`');
    expect(delimitIdentifier('mssql', 'a]b')).toBe('[a]]b]');
    expect(delimitIdentifier('mssql', 'a[b')).toBe('[a[b]');
  });

  it('always delimits with delimitIdentifier', () => {
    expect(delimitIdentifier('postgres', 'email')).toBe('"email"');
    expect(createDelimitingQuoter('mssql').quoteIdentifier('Email')).toBe('[Email]');
  });

  it('quotes qualified names segment by segment', () => {
    expect(quoteQualifiedName('postgres', 'public.users')).toBe('public.users');
    expect(quoteQualifiedName('postgres', 'public.user')).toBe('public."user"');
    expect(quoteQualifiedName('mssql', 'dbo.order items')).toBe('dbo.[order items]');
  });

  it('round-trips through unquoteIdentifier', () => {
    const names = ['select', 'say "hi"', 'back`tick', 'a]b', 'plain'];
    for (const dialect of dialects) {
      for (const name of names) {
        const quoted = quoteIdentifier(dialect, name);
        expect(unquoteIdentifier(dialect, quoted)).toBe(name);
        expect(quoteIdentifier(dialect, unquoteIdentifier(dialect, quoted))).toBe(quoted);
      }
    }
  });

  it('returns bare segments untouched from unquoteIdentifier', () => {
    expect(unquoteIdentifier('postgres', 'users')).toBe('users');
    expect(unquoteIdentifier('mssql', '"users"')).toBe('"users"');
  });

  it('exposes a conditional Quoter', () => {
    const quoter = createQuoter('mysql');
    expect(quoter.quoteIdentifier('order')).toBe('`order`');
    expect(quoter.quoteIdentifier('orders')).toBe('orders');
  });
});
