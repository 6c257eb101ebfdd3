/**
 * Escaping for values embedded in a workflow command line.
 *
 * Message rules:
 *  - '%'  => '%25'
 *  - '\r' => '%0D'
 *  - '\n' => '%0A'
 *
 * Property values additionally:
 *  - ':'  => '%3A'
 *  - ','  => '%2C'
 *
 * '%' is always replaced first so the percent signs introduced by later
 * substitutions are never escaped again.
 */

/** Scalar values accepted as a command message or property value. */
export type CommandValue = string | number | boolean | null | undefined;

/** Canonical text for a command value; absent values become ''. */
export function toCommandValue(value: CommandValue): string {
  if (value === null || value === undefined) return '';
  return typeof value === 'string' ? value : String(value);
}

export function escapeMessage(value: CommandValue): string {
  return toCommandValue(value)
    .replace(/%/g, '%25')
    .replace(/\r/g, '%0D')
    .replace(/\n/g, '%0A');
}

export function escapeProperty(value: CommandValue): string {
  return escapeMessage(value)
    .replace(/:/g, '%3A')
    .replace(/,/g, '%2C');
}
