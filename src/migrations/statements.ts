/**
 * Splits a script on the literal `;`. There is no awareness of quoting or
 * comments, so a `;` inside a string literal ends the statement.
 */
export function splitStatements(script: string): string[] {
  return script
    .split(';')
    .map(statement => statement.trim())
    .filter(statement => statement.length > 0);
}
