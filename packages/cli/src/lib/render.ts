/**
 * Terminal output for commands, logs and metric lines
 */

const RED = "\x1b[31m";
const RESET = "\x1b[0m";

/**
 * Records and listings go to stdout; `raw` drops the indentation
 */
export function printJson(data: unknown, options?: { raw?: boolean }): void {
  console.log(options?.raw ? JSON.stringify(data) : JSON.stringify(data, null, 2));
}

export function printLines(lines: readonly string[]): void {
  for (const line of lines) {
    console.log(line);
  }
}

/**
 * Diagnostics never touch stdout, which may be piped into another tool
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Red on a terminal, unchanged when stderr is redirected
 */
export function highlightError(text: string, stream: { readonly isTTY?: boolean } = process.stderr): string {
  return stream.isTTY === true ? `${RED}${text}${RESET}` : text;
}
