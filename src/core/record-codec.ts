import { z } from 'zod';
import { DEFAULT_PRIORITY, PRIORITIES, STATUSES } from '../constants.js';
import type { Comment, Task } from '../types/task.js';
import { MalformedRecordError } from './errors.js';

const FRONTMATTER_DELIMITER = '---';
const DESCRIPTION_HEADING = '## Description';
const THREAD_HEADING = '## Thread';
const COMMENT_PREFIX = '### ';
const COMMENT_SEPARATOR = ' - ';

const LIST_KEYS = ['assigned', 'subscribers', 'tags'] as const;
const LINK_KEYS = ['prd', 'plan', 'pr'] as const;

const stringList = z.array(z.string());
const statusSchema = z.enum(STATUSES);
const prioritySchema = z.enum(PRIORITIES);

/**
 * Free-text lines that could be read back as a heading (or that start with the
 * escape character itself) get a leading backslash.
 */
function escapeLine(line: string): string {
  return line.startsWith('#') || line.startsWith('\\') ? `\\${line}` : line;
}

function unescapeLine(line: string): string {
  return line.startsWith('\\') ? line.slice(1) : line;
}

// Structural lines (delimiters, headings) may carry a CR from CRLF files; free text keeps it
function bare(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function escapeBlock(text: string): string[] {
  return text.split('\n').map(escapeLine);
}

/**
 * Serialize a task to its markdown record.
 */
export function encodeTask(task: Task): string {
  const fm: string[] = [
    FRONTMATTER_DELIMITER,
    `id: ${task.id}`,
    `title: ${task.title}`,
    `status: ${task.status}`,
    `priority: ${task.priority}`,
    `created: ${task.created}`,
    `updated: ${task.updated}`,
  ];
  for (const key of LIST_KEYS) {
    fm.push(`${key}: ${JSON.stringify(task[key])}`);
  }
  for (const key of LINK_KEYS) {
    const value = task[key];
    if (value) fm.push(`${key}: ${value}`);
  }
  fm.push(FRONTMATTER_DELIMITER);

  const body: string[] = [
    '',
    `# ${task.title}`,
    '',
    DESCRIPTION_HEADING,
    ...escapeBlock(task.description),
    '',
  ];

  if (task.thread.length > 0) {
    body.push(THREAD_HEADING, '');
    for (const comment of task.thread) {
      body.push(`${COMMENT_PREFIX}${comment.timestamp}${COMMENT_SEPARATOR}${comment.agent}`);
      body.push(...escapeBlock(comment.message));
      body.push('');
    }
  }

  return [...fm, ...body].join('\n');
}

function parseFrontmatter(lines: string[], sourcePath: string): Map<string, string> {
  const fields = new Map<string, string>();
  for (const line of lines) {
    const colon = line.indexOf(':');
    if (colon === -1) continue;
    fields.set(line.slice(0, colon).trim(), line.slice(colon + 1).trim());
  }
  if (!fields.get('id')) {
    throw new MalformedRecordError(sourcePath, 'frontmatter has no id');
  }
  return fields;
}

function parseList(fields: Map<string, string>, key: string, sourcePath: string): string[] {
  const raw = fields.get(key);
  if (raw === undefined || raw === '') return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new MalformedRecordError(sourcePath, `${key} is not a JSON array`);
  }
  const result = stringList.safeParse(parsed);
  if (!result.success) {
    throw new MalformedRecordError(sourcePath, `${key} must be an array of strings`);
  }
  return result.data;
}

/**
 * Drop the one blank separator line the encoder writes after a block.
 */
function trimSeparator(lines: string[]): string[] {
  return lines.length > 0 && bare(lines[lines.length - 1]) === '' ? lines.slice(0, -1) : lines;
}

function parseThread(lines: string[], sourcePath: string): Comment[] {
  const thread: Comment[] = [];
  let current: { timestamp: string; agent: string; lines: string[] } | null = null;

  const flush = () => {
    if (!current) return;
    thread.push({
      timestamp: current.timestamp,
      agent: current.agent,
      message: trimSeparator(current.lines).map(unescapeLine).join('\n'),
    });
  };

  for (const line of lines) {
    if (line.startsWith(COMMENT_PREFIX)) {
      flush();
      const heading = bare(line).slice(COMMENT_PREFIX.length);
      const sep = heading.indexOf(COMMENT_SEPARATOR);
      if (sep <= 0 || sep + COMMENT_SEPARATOR.length >= heading.length) {
        throw new MalformedRecordError(sourcePath, `bad comment heading "${bare(line)}"`);
      }
      current = {
        timestamp: heading.slice(0, sep),
        agent: heading.slice(sep + COMMENT_SEPARATOR.length),
        lines: [],
      };
    } else if (current) {
      current.lines.push(line);
    }
  }
  flush();
  return thread;
}

/**
 * Parse a markdown record. `sourcePath` is only used in error messages.
 */
export function decodeTask(document: string, sourcePath: string): Task {
  const lines = document.split('\n');
  if (bare(lines[0]) !== FRONTMATTER_DELIMITER) {
    throw new MalformedRecordError(sourcePath, 'missing opening frontmatter delimiter');
  }
  const close = lines.findIndex((line, i) => i > 0 && bare(line) === FRONTMATTER_DELIMITER);
  if (close === -1) {
    throw new MalformedRecordError(sourcePath, 'missing closing frontmatter delimiter');
  }

  const fields = parseFrontmatter(lines.slice(1, close), sourcePath);
  const body = lines.slice(close + 1);

  const status = statusSchema.safeParse(fields.get('status') || 'inbox');
  if (!status.success) {
    throw new MalformedRecordError(sourcePath, `unknown status "${fields.get('status')}"`);
  }
  const priority = prioritySchema.safeParse(fields.get('priority') || DEFAULT_PRIORITY);
  if (!priority.success) {
    throw new MalformedRecordError(sourcePath, `unknown priority "${fields.get('priority')}"`);
  }

  let description = '';
  let thread: Comment[] = [];
  const descStart = body.findIndex(line => bare(line) === DESCRIPTION_HEADING);
  const threadStart = body.findIndex((line, i) => i > descStart && bare(line) === THREAD_HEADING);

  if (descStart !== -1) {
    const end = threadStart === -1 ? body.length : threadStart;
    description = trimSeparator(body.slice(descStart + 1, end)).map(unescapeLine).join('\n');
  }
  if (threadStart !== -1) {
    thread = parseThread(body.slice(threadStart + 1), sourcePath);
  }

  const created = fields.get('created') ?? '';
  const task: Task = {
    id: fields.get('id') ?? '',
    title: fields.get('title') ?? '',
    description,
    status: status.data,
    priority: priority.data,
    assigned: parseList(fields, 'assigned', sourcePath),
    subscribers: parseList(fields, 'subscribers', sourcePath),
    tags: parseList(fields, 'tags', sourcePath),
    created,
    updated: fields.get('updated') || created,
    thread,
  };
  for (const key of LINK_KEYS) {
    const value = fields.get(key);
    if (value) task[key] = value;
  }
  return task;
}
