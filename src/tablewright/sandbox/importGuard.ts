// sandbox/importGuard.ts

import ts from "typescript";

import { SandboxViolation } from "../model/errors.js";

export interface ImportSite {
  /** 1-based */
  readonly line: number;
  readonly source: string;
  readonly specifier: string | undefined;
}

function specifierOf(expr: ts.Expression | undefined): string | undefined {
  return expr && ts.isStringLiteralLike(expr) ? expr.text : undefined;
}

/** Static import, re-export, `import x = require()`, dynamic `import()` or `require()` */
function importSpecifier(node: ts.Node): { specifier: string | undefined } | undefined {
  if (ts.isImportDeclaration(node)) return { specifier: specifierOf(node.moduleSpecifier) };

  if (ts.isImportEqualsDeclaration(node)) {
    const ref = node.moduleReference;
    return {
      specifier: ts.isExternalModuleReference(ref) ? specifierOf(ref.expression) : undefined,
    };
  }

  if (ts.isExportDeclaration(node) && node.moduleSpecifier) {
    return { specifier: specifierOf(node.moduleSpecifier) };
  }

  if (ts.isCallExpression(node)) {
    const callee = node.expression;
    if (callee.kind === ts.SyntaxKind.ImportKeyword) {
      return { specifier: specifierOf(node.arguments[0]) };
    }
    if (ts.isIdentifier(callee) && callee.text === "require") {
      return { specifier: specifierOf(node.arguments[0]) };
    }
  }
  return undefined;
}

/** Every module-loading construct in `source`, in source order. Nothing is executed. */
export function findImports(source: string, file: string): ImportSite[] {
  const sf = ts.createSourceFile(file, source, ts.ScriptTarget.ES2022, true, ts.ScriptKind.TS);
  const lines = source.split(/\r?\n/);
  const sites: ImportSite[] = [];

  const visit = (node: ts.Node): void => {
    const found = importSpecifier(node);
    if (found) {
      const { line } = sf.getLineAndCharacterOfPosition(node.getStart(sf));
      sites.push({
        line: line + 1,
        source: (lines[line] ?? "").trimEnd(),
        specifier: found.specifier,
      });
    }
    ts.forEachChild(node, visit);
  };
  visit(sf);

  return sites;
}

/** Throw on the first import found */
export function assertNoImports(source: string, file: string): void {
  const [first] = findImports(source, file);
  if (first) throw new SandboxViolation(file, first.line, first.source);
}
