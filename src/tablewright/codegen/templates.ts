// codegen/templates.ts

import { readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import Mustache from "mustache";

import { TemplateRenderError } from "../model/errors.js";

export type TemplateName = "java_enum" | "java_enum_converter" | "jooq_generator_config";

export const TEMPLATE_NAMES: readonly TemplateName[] = [
  "java_enum",
  "java_enum_converter",
  "jooq_generator_config",
];

export const TEMPLATE_DIR = fileURLToPath(new URL("../../../templates/", import.meta.url));

export type TemplateLoader = (name: TemplateName) => Promise<string>;

/** Sources of every template, loaded up front so rendering stays synchronous */
export type TemplateSet = Readonly<Record<TemplateName, string>>;

export type EscapeMode = "none" | "xml";

const XML_ENTITIES: Readonly<Record<string, string>> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

export function escapeXml(value: string): string {
  return String(value).replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

/** Reads `<name>.mustache` from `dir` */
export function fileLoader(dir: string = TEMPLATE_DIR): TemplateLoader {
  return (name) => readFile(path.join(dir, `${name}.mustache`), "utf8");
}

export async function loadTemplates(loader: TemplateLoader = fileLoader()): Promise<TemplateSet> {
  const entries = await Promise.all(
    TEMPLATE_NAMES.map(async (name) => {
      try {
        return [name, await loader(name)] as const;
      } catch (err) {
        throw new TemplateRenderError(name, err);
      }
    })
  );
  const set: Record<TemplateName, string> = {
    java_enum: "",
    java_enum_converter: "",
    jooq_generator_config: "",
  };
  for (const [name, source] of entries) set[name] = source;
  return set;
}

/** Render one template; engine failures carry the template name */
export function renderTemplate(
  templates: TemplateSet,
  name: TemplateName,
  view: object,
  escape: EscapeMode = "none"
): string {
  try {
    return Mustache.render(templates[name], view, undefined, {
      escape: escape === "xml" ? escapeXml : (value: string) => String(value),
    });
  } catch (err) {
    throw new TemplateRenderError(name, err);
  }
}
