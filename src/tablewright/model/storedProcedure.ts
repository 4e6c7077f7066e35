// model/storedProcedure.ts

import { ConfigurationError } from "./errors.js";
import { ValueHolder } from "./valueHolder.js";
import { isValidIdentifier } from "../utils/naming.js";
import { dedent } from "../utils/text.js";

export type ParamDirection = "IN" | "OUT" | "INOUT";

export const IN: ParamDirection = "IN";
export const OUT: ParamDirection = "OUT";
export const INOUT: ParamDirection = "INOUT";

const DIRECTIONS: readonly ParamDirection[] = [IN, OUT, INOUT];

export class ProcParam {
  readonly direction: ParamDirection;

  constructor(
    public readonly name: string,
    public readonly type: string,
    direction: string = IN
  ) {
    if (!isValidIdentifier(name)) {
      throw new ConfigurationError(`Invalid procedure parameter name "${name}"`);
    }
    if (typeof type !== "string" || type.trim() === "") {
      throw new ConfigurationError(`Procedure parameter ${name} needs a type`);
    }
    const dir = DIRECTIONS.find((d) => d === String(direction).toUpperCase());
    if (!dir) {
      throw new ConfigurationError(`Invalid direction "${direction}" for parameter ${name}`);
    }
    this.direction = dir;
  }

  /** `OUT count BIGINT` */
  get sql(): string {
    return `${this.direction} ${this.name} ${this.type.trim()}`;
  }
}

export class ProcComment extends ValueHolder<string> {}

export class ProcSqlBody extends ValueHolder<string> {}

export type ProcedurePart = ProcParam | ProcComment | ProcSqlBody;

/**
 * Procedure collected at schema level. The body is kept dedented; each dialect
 * renders it into its own CREATE OR REPLACE form.
 */
export class StoredProcedure {
  readonly params: readonly ProcParam[];
  readonly comment: string | undefined;
  readonly body: string;

  constructor(
    public readonly name: string,
    parts: readonly ProcedurePart[]
  ) {
    if (!isValidIdentifier(name)) {
      throw new ConfigurationError(`Invalid procedure name "${name}"`);
    }
    const params: ProcParam[] = [];
    let comment: string | undefined;
    let body: string | undefined;

    for (const part of parts) {
      if (part instanceof ProcParam) {
        if (params.some((p) => p.name === part.name)) {
          throw new ConfigurationError(`Procedure ${name} repeats parameter ${part.name}`);
        }
        params.push(part);
      } else if (part instanceof ProcComment) {
        if (comment !== undefined) {
          throw new ConfigurationError(`Procedure ${name} has more than one comment`);
        }
        comment = part.get();
      } else if (part instanceof ProcSqlBody) {
        if (body !== undefined) {
          throw new ConfigurationError(`Procedure ${name} has more than one body`);
        }
        body = dedent(part.get());
      } else {
        throw new ConfigurationError(`Procedure ${name}: unsupported part ${String(part)}`);
      }
    }

    if (body === undefined || body === "") {
      throw new ConfigurationError(`Procedure ${name} needs a ProcSqlBody`);
    }
    this.params = Object.freeze(params);
    this.comment = comment;
    this.body = body;
  }
}
