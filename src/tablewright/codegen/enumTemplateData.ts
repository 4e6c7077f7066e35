// codegen/enumTemplateData.ts

import type { Enumeration } from "../model/enumeration.js";

export const CONVERTER_SUFFIX = "TypeConverter";

export interface EnumValueData {
  readonly valname: string;
  readonly valnum: number;
  /** Only on the final value, so templates can skip its separator */
  readonly last?: true;
}

export interface Packages {
  readonly enums: string;
  readonly converters: string;
  readonly db: string;
}

export const DEFAULT_BASE_PACKAGE = "com.example.dbutils";

/** `<base>.<schema>.enums`, `<base>.<schema>.enums.converters`, `<base>.<schema>.db` */
export function packagesFor(schemaName: string, base: string = DEFAULT_BASE_PACKAGE): Packages {
  const root = `${base}.${schemaName.toLowerCase()}`;
  return {
    enums: `${root}.enums`,
    converters: `${root}.enums.converters`,
    db: `${root}.db`,
  };
}

/** Everything the enum and converter templates read for one enumeration */
export class EnumTemplateData {
  constructor(
    public readonly enumeration: Enumeration,
    public readonly packages: Packages
  ) {}

  get name(): string {
    return this.enumeration.name;
  }

  get codeFileName(): string {
    return `${this.name}.java`;
  }

  get converterClassName(): string {
    return `${this.name}${CONVERTER_SUFFIX}`;
  }

  get converterFileName(): string {
    return `${this.converterClassName}.java`;
  }

  get enumFqn(): string {
    return `${this.packages.enums}.${this.name}`;
  }

  get converterFqn(): string {
    return `${this.packages.converters}.${this.converterClassName}`;
  }

  values(): EnumValueData[] {
    const entries = this.enumeration.entries();
    return entries.map(({ code, name }, i) =>
      i === entries.length - 1 ? { valname: name, valnum: code, last: true } : { valname: name, valnum: code }
    );
  }

  /** Mustache view; `extra` holds the per-file keys */
  view(extra: Record<string, string>): Record<string, unknown> {
    return {
      name: this.name,
      values: this.values(),
      converter_class_name: this.converterClassName,
      enum_fqn: this.enumFqn,
      converter_fqn: this.converterFqn,
      ...extra,
    };
  }
}
