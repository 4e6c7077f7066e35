// model/errors.ts

/**
 * Every failure the compiler reports. None of them is recovered locally: the
 * run for the offending schema stops and already written artifacts stay.
 */
export class TablewrightError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Disallowed construct found in an untrusted model source */
export class SandboxViolation extends TablewrightError {
  constructor(
    public readonly file: string,
    public readonly line: number,
    public readonly source: string
  ) {
    super(
      `Invalid model: import statement found on line ${line} of ${file}:\n${source}`,
      "SANDBOX_VIOLATION"
    );
  }
}

export class MissingSchemaName extends TablewrightError {
  constructor(public readonly file: string) {
    super(
      [
        "Schema name is required in DB model files but could not be found in:",
        `    ${file}`,
        "Specify a schema with:",
        '    Schema("name")',
      ].join("\n"),
      "MISSING_SCHEMA_NAME"
    );
  }
}

export class InvalidSchemaName extends TablewrightError {
  constructor(
    public readonly schemaName: string,
    public readonly file: string,
    forbidden: string
  ) {
    super(
      [
        "Invalid schema name:",
        `    ${schemaName}`,
        "was found in file:",
        `    ${file}`,
        `A valid schema name cannot contain any of: ${forbidden}`,
      ].join("\n"),
      "INVALID_SCHEMA_NAME"
    );
  }
}

export type DefinitionKind = "enum" | "table" | "column" | "enum value";

export class DuplicateDefinition extends TablewrightError {
  constructor(
    public readonly kind: DefinitionKind,
    public readonly definitionName: string,
    public readonly owner?: string
  ) {
    const where = owner ? ` for ${kind === "column" ? "table" : "enum"} ${owner}` : "";
    super(`${definitionName} ${kind} already defined${where}`, "DUPLICATE_DEFINITION");
  }
}

/** Misuse of the builder API or an unresolvable model */
export class ConfigurationError extends TablewrightError {
  constructor(message: string) {
    super(message, "CONFIGURATION_ERROR");
  }
}

export class TemplateRenderError extends TablewrightError {
  constructor(
    public readonly template: string,
    cause: unknown
  ) {
    super(
      `Failed to render template ${template}: ${describe(cause)}`,
      "TEMPLATE_RENDER_ERROR",
      { cause }
    );
  }
}

/** A database-facing step of enum materialization failed */
export class MaterializationError extends TablewrightError {
  constructor(
    public readonly subject: string,
    cause: unknown
  ) {
    super(`Materialization failed for ${subject}: ${describe(cause)}`, "MATERIALIZATION_ERROR", {
      cause,
    });
  }
}

/** The model source does not parse, or throws while being evaluated */
export class ModelLoadError extends TablewrightError {
  constructor(
    public readonly file: string,
    cause: unknown
  ) {
    super(`Could not load model ${file}: ${describe(cause)}`, "MODEL_LOAD_ERROR", { cause });
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
