/**
 * Text helpers shared by the renderers
 */

/**
 * Indent every line after the first, for values spliced into a line
 */
export function indentContinuation(text: string, spaces: number): string {
  const pad = " ".repeat(spaces);
  return text.split("\n").join(`\n${pad}`);
}

/**
 * Keep text on one line (for line comments)
 */
export function singleLine(text: string): string {
  return text.replace(/[\r\n\u2028\u2029]+/g, " ");
}

/**
 * Make text safe inside a block comment
 */
export function escapeBlockComment(text: string): string {
  return singleLine(text).replace(/\*\//g, "*\\/");
}

/**
 * Make text safe inside a triple-quoted docstring
 */
export function escapeDocstring(text: string): string {
  return singleLine(text).replace(/\\/g, "\\\\").replace(/"""/g, '\\"\\"\\"');
}

/**
 * Double-quoted string literal, valid in both TypeScript and Python
 */
export function quote(text: string): string {
  return JSON.stringify(text);
}
