import { describe, it, expect } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InvalidInputError } from '@coffee-chat/core';
import { NunjucksTemplateRenderer, formatTemplateText, loadTemplateFile, parseTemplateText } from './template.js';

const variables = {
  recipient_name: 'Ada',
  sender_name: 'Grace',
  availabilities: ['Monday Mar 2: 10am–5pm', 'Tuesday Mar 3: 9am–11am'],
};

describe('NunjucksTemplateRenderer', () => {
  const renderer = new NunjucksTemplateRenderer();

  it('fills in names and loops over availabilities', () => {
    const body = renderer.render(
      'Hi {{ recipient_name }},{% for slot in availabilities %}\n- {{ slot }}{% endfor %}\n{{ sender_name }}',
      variables
    );

    expect(body).toBe('Hi Ada,\n- Monday Mar 2: 10am–5pm\n- Tuesday Mar 3: 9am–11am\nGrace');
  });

  it('does not escape markup characters', () => {
    expect(renderer.render('{{ sender_name }}', { ...variables, sender_name: 'Tom & Jerry <tj>' })).toBe(
      'Tom & Jerry <tj>'
    );
  });

  it('rejects variables it does not know', () => {
    expect(() => renderer.render('Hello {{ nickname }}', variables)).toThrow(InvalidInputError);
  });

  it('rejects broken syntax', () => {
    expect(() => renderer.render('{% for slot in availabilities %}', variables)).toThrow(
      /^Template could not be rendered/
    );
  });
});

describe('parseTemplateText', () => {
  it('splits subject and body at the separator', () => {
    const template = parseTemplateText('Subject:  Coffee, {{ recipient_name }}?\n---\nHi\n\nBye');

    expect(template).toEqual({ subject: 'Coffee, {{ recipient_name }}?', body: 'Hi\n\nBye' });
  });

  it('accepts Windows line endings', () => {
    expect(parseTemplateText('Subject: Hi\r\n---\r\nBody')).toEqual({ subject: 'Hi', body: 'Body' });
  });

  it('requires the subject line and separator', () => {
    expect(() => parseTemplateText('Hi there\n---\nBody')).toThrow(InvalidInputError);
    expect(() => parseTemplateText('Subject: Hi\nBody')).toThrow(
      'Template must start with a "Subject:" line followed by "---"'
    );
    expect(() => parseTemplateText('')).toThrow(InvalidInputError);
  });

  it('reads back what formatTemplateText writes', () => {
    const template = { subject: 'Coffee?', body: 'Line one\nLine two' };

    expect(parseTemplateText(formatTemplateText(template))).toEqual(template);
  });
});

describe('loadTemplateFile', () => {
  it('loads a template from disk', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'coffee-chat-template-'));
    try {
      const path = join(dir, 'email_template.txt');
      await writeFile(path, 'Subject: Coffee?\n---\nHi {{ recipient_name }}');

      await expect(loadTemplateFile(path)).resolves.toEqual({ subject: 'Coffee?', body: 'Hi {{ recipient_name }}' });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('reports a missing file as invalid input', async () => {
    await expect(loadTemplateFile(join(tmpdir(), 'coffee-chat-missing', 'nope.txt'))).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });
});
