export type TriggerTiming = 'BEFORE' | 'AFTER' | 'INSTEAD OF';

export type TriggerEvent = 'INSERT' | 'UPDATE' | 'DELETE' | 'TRUNCATE';

export type TriggerLevel = 'ROW' | 'STATEMENT';

/** Plain shape of a trigger. */
export interface TriggerDefinition {
  readonly name: string;
  readonly table: string;
  readonly schema?: string;
  readonly timing: TriggerTiming;
  /** Distinct events, in the order they were added. */
  readonly events: readonly TriggerEvent[];
  readonly level: TriggerLevel;
  readonly whenCondition?: string;
  /** Trigger function to execute (PostgreSQL). */
  readonly functionName?: string;
  /** Inline trigger body (MySQL, SQLite, SQL Server). */
  readonly body?: string;
  /** Restricts an UPDATE trigger to these columns. */
  readonly updateColumns: readonly string[];
  readonly comment?: string;
}

const distinct = <T>(values: readonly T[]): T[] => [...new Set(values)];

/**
 * Immutable description of a `CREATE TRIGGER` statement.
 * Defaults to an AFTER INSERT row-level trigger.
 */
export class TriggerSpec implements TriggerDefinition {
  readonly name: string;
  readonly table: string;
  readonly schema?: string;
  readonly timing: TriggerTiming;
  readonly events: readonly TriggerEvent[];
  readonly level: TriggerLevel;
  readonly whenCondition?: string;
  readonly functionName?: string;
  readonly body?: string;
  readonly updateColumns: readonly string[];
  readonly comment?: string;

  private constructor(def: TriggerDefinition) {
    this.name = def.name;
    this.table = def.table;
    this.schema = def.schema;
    this.timing = def.timing;
    this.events = Object.freeze(distinct(def.events));
    this.level = def.level;
    this.whenCondition = def.whenCondition;
    this.functionName = def.functionName;
    this.body = def.body;
    this.updateColumns = Object.freeze([...def.updateColumns]);
    this.comment = def.comment;
    Object.freeze(this);
  }

  static create(name: string, table: string): TriggerSpec {
    return new TriggerSpec({
      name,
      table,
      timing: 'AFTER',
      events: ['INSERT'],
      level: 'ROW',
      updateColumns: []
    });
  }

  static from(def: TriggerDefinition): TriggerSpec {
    return new TriggerSpec(def);
  }

  withSchema(schema: string): TriggerSpec {
    return this.with({ schema });
  }

  withTiming(timing: TriggerTiming): TriggerSpec {
    return this.with({ timing });
  }

  /** Replaces the event list with a single event. */
  withEvent(event: TriggerEvent): TriggerSpec {
    return this.with({ events: [event] });
  }

  withEvents(events: readonly TriggerEvent[]): TriggerSpec {
    return this.with({ events });
  }

  addEvent(event: TriggerEvent): TriggerSpec {
    return this.with({ events: [...this.events, event] });
  }

  withLevel(level: TriggerLevel): TriggerSpec {
    return this.with({ level });
  }

  withWhen(condition: string): TriggerSpec {
    return this.with({ whenCondition: condition });
  }

  withFunction(functionName: string): TriggerSpec {
    return this.with({ functionName });
  }

  withBody(body: string): TriggerSpec {
    return this.with({ body });
  }

  withUpdateColumns(columns: readonly string[]): TriggerSpec {
    return this.with({ updateColumns: columns });
  }

  withComment(comment: string): TriggerSpec {
    return this.with({ comment });
  }

  toDefinition(): TriggerDefinition {
    return {
      name: this.name,
      table: this.table,
      schema: this.schema,
      timing: this.timing,
      events: this.events,
      level: this.level,
      whenCondition: this.whenCondition,
      functionName: this.functionName,
      body: this.body,
      updateColumns: this.updateColumns,
      comment: this.comment
    };
  }

  private with(patch: Partial<TriggerDefinition>): TriggerSpec {
    return new TriggerSpec({ ...this.toDefinition(), ...patch });
  }
}
