// utils/text.ts

/** Strip trailing whitespace from every line */
export function multilineRstrip(text: string): string {
  return text
    .split(/\r?\n/)
    .map((line) => line.replace(/\s+$/, ""))
    .join("\n");
}

/**
 * Remove the common leading indentation of all non-blank lines and drop
 * blank lines at both ends.
 */
export function dedent(text: string): string {
  const lines = text.split(/\r?\n/);
  while (lines.length > 0 && lines[0]?.trim() === "") lines.shift();
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === "") lines.pop();

  let margin = Infinity;
  for (const line of lines) {
    if (line.trim() === "") continue;
    const width = line.length - line.trimStart().length;
    margin = Math.min(margin, width);
  }
  if (margin === Infinity) margin = 0;

  return lines
    .map((line) => (line.trim() === "" ? "" : line.slice(margin)))
    .join("\n");
}

/** Prefix every non-blank line */
export function indent(text: string, prefix = "    "): string {
  return text
    .split("\n")
    .map((line) => (line.trim() === "" ? line : `${prefix}${line}`))
    .join("\n");
}

export function escapeLiteral(s: string): string {
  return String(s).replace(/'/g, "''");
}
