/**
 * CLI Display Abstraction Layer
 *
 * Path results always go to stdout via stdout().
 * TTY-aware: uses @clack/prompts styled output in interactive terminals,
 * falls back to plain stderr text in pipes/CI so results stay parseable.
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';

const isTTY = process.stderr.isTTY === true;
const output = process.stderr;

export function success(msg: string): void {
  if (isTTY) {
    p.log.success(msg);
  } else {
    output.write(`${msg}\n`);
  }
}

export function error(msg: string): void {
  if (isTTY) {
    p.log.error(msg);
  } else {
    output.write(`❌ ${msg}\n`);
  }
}

export function info(msg: string): void {
  if (isTTY) {
    p.log.info(msg);
  } else {
    output.write(`${msg}\n`);
  }
}

// Boxed display (config sections)
export function note(msg: string, title?: string): void {
  if (isTTY) {
    p.note(msg, title);
  } else {
    if (title) output.write(`${title}\n`);
    output.write(`${msg}\n`);
  }
}

// Machine-readable stdout - no decoration
export function stdout(text: string): void {
  process.stdout.write(`${text}\n`);
}

// Bold text for headers (TTY-aware)
export function bold(text: string): string {
  return isTTY ? pc.bold(text) : text;
}

// Dim text for secondary info (TTY-aware)
export function dim(text: string): string {
  return isTTY ? pc.dim(text) : text;
}

// Cyan text for highlights (TTY-aware)
export function cyan(text: string): string {
  return isTTY ? pc.cyan(text) : text;
}
