// model/metadata.ts

import { BuildContext } from "./buildContext.js";
import type { ColumnShape } from "./column.js";
import type { Enumeration } from "./enumeration.js";
import { ConfigurationError, DuplicateDefinition, MissingSchemaName } from "./errors.js";
import type { StoredProcedure } from "./storedProcedure.js";
import type { ColumnNames, Table, TableShape } from "./table.js";
import { validateAndSortTables } from "../utils/dependencySort.js";
import { enumTableName } from "../utils/naming.js";

/** Enumerations by name, in declaration order; lookup table names are unique too */
export class EnumCollection implements Iterable<Enumeration> {
  private readonly byName = new Map<string, Enumeration>();
  private readonly byTable = new Map<string, Enumeration>();

  add(enumeration: Enumeration): void {
    if (this.byName.has(enumeration.name)) {
      throw new DuplicateDefinition("enum", enumeration.name);
    }
    const table = enumTableName(enumeration.name);
    const other = this.byTable.get(table);
    if (other) {
      throw new ConfigurationError(
        `Enums ${other.name} and ${enumeration.name} would share the lookup table ${table}`
      );
    }
    this.byName.set(enumeration.name, enumeration);
    this.byTable.set(table, enumeration);
  }

  get(name: string): Enumeration | undefined {
    return this.byName.get(name);
  }

  require(name: string): Enumeration {
    const e = this.byName.get(name);
    if (!e) throw new ConfigurationError(`Unknown enum ${name}`);
    return e;
  }

  get size(): number {
    return this.byName.size;
  }

  [Symbol.iterator](): Iterator<Enumeration> {
    return this.byName.values();
  }
}

/** Column-name namespaces of all tables */
export class TableNames {
  private readonly byName = new Map<string, ColumnNames>();

  add(names: ColumnNames): void {
    if (this.byName.has(names.tableName)) {
      throw new DuplicateDefinition("table", names.tableName);
    }
    this.byName.set(names.tableName, names);
  }

  get(table: string): ColumnNames {
    const names = this.byName.get(table);
    if (!names) throw new ConfigurationError(`Unknown table ${table}`);
    return names;
  }

  has(table: string): boolean {
    return this.byName.has(table);
  }
}

/** Frozen, dependency-ordered view of a loaded schema read by every backend */
export interface SchemaSnapshot {
  readonly schemaName: string;
  readonly tables: readonly TableShape[];
  readonly enums: readonly Enumeration[];
  readonly procedures: readonly StoredProcedure[];
}

export type ColumnVisitor = (column: ColumnShape, table: TableShape) => void;

/** Root of the schema model */
export class SchemaMetadata {
  readonly enums = new EnumCollection();
  readonly tableNames = new TableNames();
  private readonly tableMap = new Map<string, Table>();
  private readonly procedureList: StoredProcedure[] = [];

  constructor(public readonly context: BuildContext = new BuildContext()) {}

  get file(): string {
    return this.context.file;
  }

  get schemaName(): string | undefined {
    return this.context.schemaName;
  }

  addEnum(enumeration: Enumeration): Enumeration {
    this.context.seal();
    this.enums.add(enumeration);
    return enumeration;
  }

  addTable(table: Table): Table {
    this.context.seal();
    this.tableNames.add(table.names);
    this.tableMap.set(table.name, table);
    return table;
  }

  addProcedure(procedure: StoredProcedure): StoredProcedure {
    if (this.procedureList.some((p) => p.name === procedure.name)) {
      throw new ConfigurationError(`Stored procedure ${procedure.name} already defined`);
    }
    this.procedureList.push(procedure);
    return procedure;
  }

  /** Declaration order */
  get tables(): readonly Table[] {
    return [...this.tableMap.values()];
  }

  get procedures(): readonly StoredProcedure[] {
    return [...this.procedureList];
  }

  table(name: string): Table | undefined {
    return this.tableMap.get(name);
  }

  /** Referenced tables first */
  sortedTables(): Table[] {
    return validateAndSortTables(this.tables);
  }

  visitColumns(...visitors: ColumnVisitor[]): void {
    for (const table of this.sortedTables()) {
      for (const column of table.columns) {
        for (const visit of visitors) visit(column, table);
      }
    }
  }

  snapshot(): SchemaSnapshot {
    const schemaName = this.schemaName;
    if (schemaName === undefined) throw new MissingSchemaName(this.file);
    return Object.freeze({
      schemaName,
      tables: Object.freeze(this.sortedTables()),
      enums: Object.freeze([...this.enums]),
      procedures: Object.freeze(this.procedures),
    });
  }
}

export type SchemaSource = SchemaMetadata | SchemaSnapshot;

export function toSnapshot(schema: SchemaSource): SchemaSnapshot {
  return schema instanceof SchemaMetadata ? schema.snapshot() : schema;
}
