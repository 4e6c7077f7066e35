// model/buildContext.ts

import { ConfigurationError } from "./errors.js";
import { ValueHolder } from "./valueHolder.js";

/**
 * State shared by the builder calls of a single model load. The schema name is
 * written once, before the first enum or table, and only read afterwards.
 */
export class BuildContext {
  private readonly schema = new ValueHolder<string | undefined>(undefined);
  private sealed = false;

  constructor(public readonly file: string = "<model>") {}

  declareSchema(name: string): void {
    if (this.schema.get() !== undefined) {
      throw new ConfigurationError(
        `Schema name already declared as "${this.schema.get()}" in ${this.file}`
      );
    }
    if (this.sealed) {
      throw new ConfigurationError(
        `Schema("${name}") must come before any Enum or Table in ${this.file}`
      );
    }
    this.schema.value = name;
  }

  /** Called by the first enum/table declaration */
  seal(): void {
    this.sealed = true;
  }

  get schemaName(): string | undefined {
    return this.schema.get();
  }

  /** Replace the declared name (hidden CLI override) */
  overrideSchemaName(name: string): void {
    this.schema.value = name;
  }
}
