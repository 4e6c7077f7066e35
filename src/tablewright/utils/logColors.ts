// utils/logColors.ts

export const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",

  // headers / sections
  section: "\x1b[36m", // cyan

  // actions (meaning)
  success: "\x1b[32m",
  error: "\x1b[31m",

  // subjects (data)
  subject: "\x1b[90m", // light gray (NOT white)
  file: "\x1b[93m", // light yellow
};

export type Color = keyof typeof colors;

export function paint(color: Color, text: string): string {
  return `${colors[color]}${text}${colors.reset}`;
}

export function subject(name: string): string {
  return paint("subject", name);
}

/**
log semantic
 SECTION:
  ===> [Action]
    * [subject]
    @ [file]
  ===<
*/
