/**
 * Invitation templates: nunjucks rendering and the Subject/---/body file format
 */

import { readFile } from 'fs/promises';
import nunjucks from 'nunjucks';
import { InvalidInputError, describeError } from '@coffee-chat/core';
import type { MessageTemplate, TemplateRenderer, TemplateVariables } from './types.js';

const SUBJECT_PREFIX = 'Subject:';
const SEPARATOR = '---';

export class NunjucksTemplateRenderer implements TemplateRenderer {
  private env = new nunjucks.Environment(null, { autoescape: false, throwOnUndefined: true });

  render(text: string, variables: TemplateVariables): string {
    try {
      return this.env.renderString(text, variables);
    } catch (error) {
      throw new InvalidInputError(`Template could not be rendered: ${describeError(error)}`, { cause: error });
    }
  }
}

/**
 * Parse template text of the form:
 *
 *     Subject: <subject template>
 *     ---
 *     <body template>
 */
export function parseTemplateText(text: string): MessageTemplate {
  const lines = text.split(/\r?\n/);
  const [subjectLine, separator] = lines;

  if (subjectLine === undefined || !subjectLine.startsWith(SUBJECT_PREFIX) || separator !== SEPARATOR) {
    throw new InvalidInputError(`Template must start with a "${SUBJECT_PREFIX}" line followed by "${SEPARATOR}"`);
  }

  return {
    subject: subjectLine.slice(SUBJECT_PREFIX.length).trim(),
    body: lines.slice(2).join('\n'),
  };
}

export function formatTemplateText(template: MessageTemplate): string {
  return `${SUBJECT_PREFIX} ${template.subject}\n${SEPARATOR}\n${template.body}`;
}

export async function loadTemplateFile(path: string): Promise<MessageTemplate> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    throw new InvalidInputError(`Failed to read template file ${path}: ${describeError(error)}`, { cause: error });
  }
  return parseTemplateText(text);
}
