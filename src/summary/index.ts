/**
 * Job summary templates.
 *
 * Templates are mustache: `{{name}}` is HTML-escaped, `{{{name}}}` is not.
 * Parsing and rendering are separate steps so a broken template and a view
 * that throws while rendering report different messages.
 */

import Mustache from 'mustache';
import { ToolkitError } from '../runner/index.js';

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function renderSummaryTemplate(template: string, data: unknown): string {
  try {
    Mustache.parse(template);
  } catch (err) {
    throw new ToolkitError('SUMMARY_TEMPLATE_FAILED', `failed to parse template: ${describe(err)}`, { cause: err });
  }

  try {
    return Mustache.render(template, data);
  } catch (err) {
    throw new ToolkitError('SUMMARY_TEMPLATE_FAILED', `failed to execute template: ${describe(err)}`, { cause: err });
  }
}
