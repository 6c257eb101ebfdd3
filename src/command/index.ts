/**
 * Workflow command model and wire format.
 *
 *   ::name key=value,key=value::message
 *
 * Examples:
 *   ::warning::This is the message
 *   ::remove-matcher owner=eslint::
 */

import { escapeMessage, escapeProperty, type CommandValue } from './escape.js';

export { escapeMessage, escapeProperty, toCommandValue, type CommandValue } from './escape.js';

const CMD_SEPARATOR = '::';
const CMD_PROPERTIES_PREFIX = ' ';

/** Name used when a command is issued without one. */
export const MISSING_COMMAND_NAME = 'missing.command';

export type CommandProperties = Readonly<Record<string, CommandValue>>;

export interface Command {
  name: string;
  message?: CommandValue;
  properties?: CommandProperties;
}

function compareUtf8(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
}

/**
 * Render properties as `k=v` pairs joined by ','. The rendered pairs are
 * sorted as whole strings by their UTF-8 bytes, so the output does not depend
 * on insertion order.
 */
export function formatProperties(properties: CommandProperties = {}): string {
  return Object.entries(properties)
    .map(([key, value]) => `${key}=${escapeProperty(value)}`)
    .sort(compareUtf8)
    .join(',');
}

/** Serialize a command to the exact line the orchestrator parses. */
export function formatCommand(command: Command): string {
  const name = command.name === '' ? MISSING_COMMAND_NAME : command.name;
  let line = CMD_SEPARATOR + name;

  const props = command.properties ?? {};
  if (Object.keys(props).length > 0) {
    line += CMD_PROPERTIES_PREFIX + formatProperties(props);
  }

  line += CMD_SEPARATOR + escapeMessage(command.message);
  return line;
}
