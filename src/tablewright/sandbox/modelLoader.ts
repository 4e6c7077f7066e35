// sandbox/modelLoader.ts

import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import path from "node:path";
import vm from "node:vm";

import ts from "typescript";

import { assertNoImports } from "./importGuard.js";
import { validateSchema } from "./validateSchema.js";
import { BuildContext } from "../model/buildContext.js";
import { ModelLoadError, TablewrightError } from "../model/errors.js";
import { SchemaMetadata, type SchemaSnapshot } from "../model/metadata.js";
import { createVocabulary } from "../model/vocabulary.js";

export interface LoadOptions {
  /** Let the model `import`/`require` other modules */
  allowImports?: boolean;
  /** Replaces the name declared with `Schema()` */
  schemaName?: string;
  /** Evaluation time limit */
  timeoutMs?: number;
}

export interface LoadedModel {
  readonly file: string;
  readonly metadata: SchemaMetadata;
  readonly schema: SchemaSnapshot;
}

const DEFAULT_TIMEOUT_MS = 5000;

function transpile(source: string, file: string): string {
  const out = ts.transpileModule(source, {
    fileName: file,
    reportDiagnostics: true,
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2022,
    },
  });
  const [first] = (out.diagnostics ?? []).filter(
    (d) => d.category === ts.DiagnosticCategory.Error
  );
  if (first) {
    const message = ts.flattenDiagnosticMessageText(first.messageText, "\n");
    const where =
      first.file && first.start !== undefined
        ? ` (line ${first.file.getLineAndCharacterOfPosition(first.start).line + 1})`
        : "";
    throw new ModelLoadError(file, `${message}${where}`);
  }
  return out.outputText;
}

/**
 * Guard, transpile and evaluate a model source. Its globals are the builder
 * vocabulary only; nothing is cached, so every call validates again.
 *
 * The vm context is not a security boundary: the vocabulary lives in the
 * host realm, so a model can reach host objects through it (for example
 * `Schema.constructor`). The import guard and the missing globals stop
 * accidental access only; load models you trust.
 */
export function loadModelSource(source: string, file: string, options: LoadOptions = {}): LoadedModel {
  if (!options.allowImports) assertNoImports(source, file);

  const code = transpile(source, file);
  const metadata = new SchemaMetadata(new BuildContext(file));

  const module = { exports: {} };
  const globals: Record<string, unknown> = {
    ...createVocabulary(metadata),
    module,
    exports: module.exports,
  };
  if (options.allowImports) globals.require = createRequire(path.resolve(file));

  try {
    const script = new vm.Script(code, { filename: file });
    const context = vm.createContext(globals, {
      codeGeneration: { strings: false, wasm: false },
    });
    script.runInContext(context, {
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    });
  } catch (err) {
    if (err instanceof TablewrightError) throw err;
    throw new ModelLoadError(file, err);
  }

  if (options.schemaName !== undefined) metadata.context.overrideSchemaName(options.schemaName);

  return { file, metadata, schema: validateSchema(metadata) };
}

export async function loadModelFile(file: string, options: LoadOptions = {}): Promise<LoadedModel> {
  let source: string;
  try {
    source = await readFile(file, "utf8");
  } catch (err) {
    throw new ModelLoadError(file, err);
  }
  return loadModelSource(source, file, options);
}
