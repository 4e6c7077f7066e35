// utils/logger.ts

import { colors, paint, subject } from "./logColors.js";

let silent = false;

/** Mute all progress output (library callers and tests) */
export function setLogSilent(value: boolean): void {
  silent = value;
}

function print(...parts: string[]): void {
  if (silent) return;
  console.log(...parts);
}

/** `SECTION:` header, one per backend run */
function section(title: string): void {
  print("");
  print(`${colors.section}${colors.bold}${title.toUpperCase()}:${colors.reset}`);
}

function action(text: string): void {
  print(paint("success", "  ===>"), text);
}

function item(text: string): void {
  print(paint("success", "    *"), subject(text));
}

function file(path: string): void {
  print(paint("file", "    @"), path);
}

/** Close the current action, red when it failed */
function done(error?: string): void {
  if (error) {
    print(paint("error", "  ===<"), paint("error", error));
    return;
  }
  print(paint("success", "  ===<"));
}

function fail(message: string): void {
  // errors are never muted
  console.error(`${paint("error", "ERROR:")} ${message}`);
}

export const logger = { section, action, item, file, done, fail };
