/**
 * CLI Demo
 * Runs the bundled sample programs and shows their output
 */

import { readFileSync } from 'node:fs';
import { interpret } from 'eightfold';

export interface DemoProgram {
  /** File name under programs/, without extension */
  readonly name: string;
  readonly title: string;
  readonly input: string;
}

export const DEMO_PROGRAMS: readonly DemoProgram[] = [
  { name: 'hello', title: 'Hello World', input: '' },
  { name: 'cat', title: 'Cat', input: 'Everything else is a comment.\n' },
  { name: 'add', title: 'Add', input: '3\u0004' },
];

/** Read a bundled program's source text */
export function readDemoSource(name: string): string {
  return readFileSync(
    new URL(`../programs/${name}.bf`, import.meta.url),
    'utf-8'
  );
}

/** Run each demo program and return the report lines */
export function renderDemo(
  programs: readonly DemoProgram[] = DEMO_PROGRAMS
): string[] {
  const lines: string[] = ['eightfold demo', ''];

  for (const demo of programs) {
    const source = readDemoSource(demo.name);
    const { text } = interpret(source, demo.input);

    lines.push(`== ${demo.title} ==`);
    if (demo.input !== '') {
      lines.push(`input:  ${JSON.stringify(demo.input)}`);
    }
    lines.push(`output: ${JSON.stringify(text)}`);
    lines.push('program:');
    for (const line of source.trimEnd().split('\n')) {
      lines.push(`  ${line}`);
    }
    lines.push('');
  }

  lines.push('Eight commands. Everything else is a comment.');
  return lines;
}
