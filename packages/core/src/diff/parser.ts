/**
 * Diff Parser
 * Turns unified diff text (as produced by `git diff --cached`) into per-file change records
 */

import { type DiffHunk, type FileChange, type FileChangeType, ParseError } from '@commitwright/shared';

const SECTION_START = /^diff --(git|cc|combined) /;
const GIT_HEADER_PREFIX = 'diff --git ';
const UNQUOTED_HEADER = /^a\/(.+?) b\/(.+)$/;
const COMBINED_HEADER = /^diff --(?:cc|combined) (.+)$/;
const HUNK_HEADER = /^@@\s-([0-9]+)(?:,([0-9]+))?\s\+([0-9]+)(?:,([0-9]+))?\s@@/;
const SUBMODULE_MODE = '160000';

const C_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '"': '"',
  '\\': '\\',
};

/**
 * A parsed file section together with its raw text
 */
export interface DiffSection {
  change: FileChange;
  raw: string;
}

interface SectionState {
  headerOld?: string;
  headerNew?: string;
  oldFile?: string;
  newFile?: string;
  renameFrom?: string;
  renameTo?: string;
  oldMode?: string;
  newMode?: string;
  isNew: boolean;
  isDeleted: boolean;
  isBinary: boolean;
  isSubmodule: boolean;
  isCombined: boolean;
  hasConflictStart: boolean;
  hasConflictEnd: boolean;
  hunks: DiffHunk[];
}

/**
 * Parse a diff into file changes, in diff order
 *
 * Blank input yields an empty list. Input that has text but no file
 * section, or a hunk header that does not parse, raises ParseError.
 */
export function parseDiff(diff: string): FileChange[] {
  return parseDiffSections(diff).map(section => section.change);
}

export function parseDiffSections(diff: string): DiffSection[] {
  if (!diff.trim()) {
    return [];
  }

  const lines = diff.split(/\r?\n/);
  const sections: DiffSection[] = [];
  let current: string[] | null = null;

  for (const line of lines) {
    if (SECTION_START.test(line)) {
      if (current) {
        sections.push(parseSection(current));
      }
      current = [line];
    } else if (current) {
      current.push(line);
    }
  }

  if (current) {
    sections.push(parseSection(current));
  }

  if (sections.length === 0) {
    throw new ParseError('Diff input contains no file sections', { preview: diff.slice(0, 200) });
  }

  return sections;
}

function parseSection(lines: string[]): DiffSection {
  // Drop the empty line a trailing newline leaves behind
  while (lines.length > 1 && lines[lines.length - 1] === '') {
    lines.pop();
  }

  const state: SectionState = {
    isNew: false,
    isDeleted: false,
    isBinary: false,
    isSubmodule: false,
    isCombined: false,
    hasConflictStart: false,
    hasConflictEnd: false,
    hunks: [],
  };

  readHeader(lines[0], state);

  let hunk: DiffHunk | null = null;
  let oldRemaining = 0;
  let newRemaining = 0;

  for (const line of lines.slice(1)) {
    if (hunk && (oldRemaining > 0 || newRemaining > 0)) {
      const marker = line.charAt(0);
      const content = line.slice(1);

      if (marker === '\\') {
        continue;
      }
      if (marker === '+' || marker === '-' || marker === ' ' || line === '') {
        if (marker === '+') {
          hunk.addedLines++;
          newRemaining--;
        } else if (marker === '-') {
          hunk.removedLines++;
          oldRemaining--;
        } else {
          hunk.unchangedLines++;
          oldRemaining--;
          newRemaining--;
        }
        hunk.modifiedLines++;
        inspectBodyLine(content, state);
        continue;
      }
      // Short hunk; fall through and treat the line as metadata
    }

    if (line.startsWith('@@')) {
      if (state.isCombined) {
        continue;
      }
      hunk = parseHunkHeader(line);
      state.hunks.push(hunk);
      oldRemaining = hunk.oldLength;
      newRemaining = hunk.newLength;
      continue;
    }

    if (state.isCombined) {
      inspectBodyLine(line.slice(2), state);
      continue;
    }

    readMetadata(line, state);
  }

  const change = buildChange(state);
  return { change, raw: lines.join('\n') };
}

function readHeader(header: string, state: SectionState): void {
  if (header.startsWith(GIT_HEADER_PREFIX)) {
    const paths = splitHeaderPaths(header.slice(GIT_HEADER_PREFIX.length));
    if (paths) {
      state.headerOld = stripPrefix(paths[0]);
      state.headerNew = stripPrefix(paths[1]);
    }
    return;
  }

  const combined = header.match(COMBINED_HEADER);
  if (combined) {
    state.isCombined = true;
    state.headerNew = combined[1];
  }
}

function readMetadata(line: string, state: SectionState): void {
  if (line.startsWith('new file mode ')) {
    state.isNew = true;
    state.newMode = line.slice('new file mode '.length).trim();
  } else if (line.startsWith('deleted file mode ')) {
    state.isDeleted = true;
    state.oldMode = line.slice('deleted file mode '.length).trim();
  } else if (line.startsWith('old mode ')) {
    state.oldMode = line.slice('old mode '.length).trim();
  } else if (line.startsWith('new mode ')) {
    state.newMode = line.slice('new mode '.length).trim();
  } else if (line.startsWith('rename from ')) {
    state.renameFrom = unquotePath(line.slice('rename from '.length));
  } else if (line.startsWith('rename to ')) {
    state.renameTo = unquotePath(line.slice('rename to '.length));
  } else if (line.startsWith('index ')) {
    const mode = line.split(' ')[2];
    if (mode === SUBMODULE_MODE) {
      state.isSubmodule = true;
    }
  } else if (line.startsWith('Binary files ') || line === 'GIT binary patch') {
    state.isBinary = true;
  } else if (line.startsWith('--- ')) {
    state.oldFile = stripPrefix(line.slice(4));
  } else if (line.startsWith('+++ ')) {
    state.newFile = stripPrefix(line.slice(4));
  }

  if (state.oldMode === SUBMODULE_MODE || state.newMode === SUBMODULE_MODE) {
    state.isSubmodule = true;
  }
}

function inspectBodyLine(content: string, state: SectionState): void {
  if (content.startsWith('<<<<<<<')) {
    state.hasConflictStart = true;
  } else if (content.startsWith('>>>>>>>')) {
    state.hasConflictEnd = true;
  } else if (content.startsWith('Subproject commit ')) {
    state.isSubmodule = true;
  }
}

function parseHunkHeader(line: string): DiffHunk {
  const match = line.match(HUNK_HEADER);
  if (!match) {
    throw new ParseError(`Malformed hunk header: ${line}`, { line });
  }

  return {
    oldStart: Number.parseInt(match[1], 10),
    oldLength: match[2] === undefined ? 1 : Number.parseInt(match[2], 10),
    newStart: Number.parseInt(match[3], 10),
    newLength: match[4] === undefined ? 1 : Number.parseInt(match[4], 10),
    addedLines: 0,
    removedLines: 0,
    unchangedLines: 0,
    modifiedLines: 0,
  };
}

/**
 * Length of a C-quoted token at the start of text, closing quote included
 */
function quotedLength(text: string): number | undefined {
  for (let i = 1; i < text.length; i++) {
    if (text[i] === '\\') {
      i++;
    } else if (text[i] === '"') {
      return i + 1;
    }
  }
  return undefined;
}

/**
 * The two paths of a `diff --git` header, either of which may be quoted
 */
function splitHeaderPaths(rest: string): [string, string] | undefined {
  if (rest.startsWith('"')) {
    const length = quotedLength(rest);
    return length === undefined ? undefined : [rest.slice(0, length), rest.slice(length + 1)];
  }

  // Unquoted paths never contain a quote, so the first ` "` starts the second path
  const quotedSecond = rest.indexOf(' "');
  if (quotedSecond >= 0) {
    return [rest.slice(0, quotedSecond), rest.slice(quotedSecond + 1)];
  }

  const match = rest.match(UNQUOTED_HEADER);
  return match ? [`a/${match[1]}`, `b/${match[2]}`] : undefined;
}

/**
 * Decode a path git wrote in C quotes (core.quotePath); octal escapes are UTF-8 bytes
 */
export function unquotePath(value: string): string {
  if (value.length < 2 || !value.startsWith('"') || !value.endsWith('"')) {
    return value;
  }

  const body = value.slice(1, -1);
  const bytes: number[] = [];
  let i = 0;
  while (i < body.length) {
    const char = String.fromCodePoint(body.codePointAt(i) ?? 0);
    if (char !== '\\') {
      bytes.push(...Buffer.from(char, 'utf8'));
      i += char.length;
      continue;
    }

    const octal = body.slice(i + 1, i + 4).match(/^[0-7]{1,3}/);
    if (octal) {
      bytes.push(Number.parseInt(octal[0], 8));
      i += 1 + octal[0].length;
      continue;
    }

    const escaped = body.charAt(i + 1);
    bytes.push(...Buffer.from(C_ESCAPES[escaped] ?? escaped, 'utf8'));
    i += 2;
  }

  return Buffer.from(bytes).toString('utf8');
}

/**
 * Unquote, then strip the a/ or b/ prefix; /dev/null becomes undefined
 */
function stripPrefix(value: string): string | undefined {
  const trimmed = value.trim();
  const quoted = trimmed.startsWith('"') ? quotedLength(trimmed) : undefined;
  const target = quoted === undefined ? trimmed.split('\t')[0].trim() : unquotePath(trimmed.slice(0, quoted));

  if (target === '/dev/null') {
    return undefined;
  }
  if (target.startsWith('a/') || target.startsWith('b/')) {
    return target.slice(2);
  }
  return target;
}

function classify(state: SectionState): FileChangeType {
  if (state.isNew) return 'NEW';
  if (state.isDeleted) return 'DELETED';
  if (state.renameFrom !== undefined && state.renameTo !== undefined) return 'RENAMED';
  if (state.oldMode !== undefined && state.newMode !== undefined && state.hunks.length === 0) {
    return 'MODE_CHANGED';
  }
  if (state.isBinary) return 'BINARY';
  if (state.isSubmodule) return 'SUBMODULE';
  if (state.isCombined || (state.hasConflictStart && state.hasConflictEnd)) return 'CONFLICT';
  return 'MODIFIED';
}

function buildChange(state: SectionState): FileChange {
  const path = state.newFile ?? state.oldFile ?? state.renameTo ?? state.headerNew ?? state.headerOld;
  if (!path) {
    throw new ParseError('Could not determine the file path of a diff section');
  }

  const changeType = classify(state);
  const change: FileChange = {
    path,
    changeType,
    addedLines: state.hunks.reduce((sum, hunk) => sum + hunk.addedLines, 0),
    removedLines: state.hunks.reduce((sum, hunk) => sum + hunk.removedLines, 0),
    hunks: state.hunks,
    purpose: '',
  };

  if (changeType === 'RENAMED') {
    change.oldPath = state.renameFrom;
  }
  if (state.oldMode !== undefined) {
    change.oldMode = state.oldMode;
  }
  if (state.newMode !== undefined) {
    change.newMode = state.newMode;
  }

  return change;
}

/**
 * Totals across all file changes
 */
export function countLines(files: FileChange[]): { added: number; removed: number } {
  return files.reduce(
    (totals, file) => ({
      added: totals.added + file.addedLines,
      removed: totals.removed + file.removedLines,
    }),
    { added: 0, removed: 0 }
  );
}
