/**
 * Output sinks: where a finished document goes.
 */

import { mkdirSync, writeFileSync } from 'fs';
import { dirname, resolve } from 'path';
import clipboardy from 'clipboardy';

export interface OutputSink {
  /** Human-readable target, used in progress messages */
  readonly label: string;
  write(text: string): Promise<void>;
}

/** Write to a file, creating parent directories as needed. */
export function fileSink(path: string): OutputSink {
  const absolutePath = resolve(path);
  return {
    label: absolutePath,
    async write(text) {
      mkdirSync(dirname(absolutePath), { recursive: true });
      writeFileSync(absolutePath, text, 'utf-8');
    },
  };
}

export function clipboardSink(): OutputSink {
  return {
    label: 'clipboard',
    async write(text) {
      await clipboardy.write(text);
    },
  };
}

export function streamSink(stream: NodeJS.WritableStream = process.stdout, label = 'stdout'): OutputSink {
  return {
    label,
    write(text) {
      return new Promise((resolvePromise, reject) => {
        stream.write(text, error => (error ? reject(error) : resolvePromise()));
      });
    },
  };
}

/** Fan one document out to several sinks, in order. */
export function multiSink(sinks: OutputSink[]): OutputSink {
  return {
    label: sinks.map(s => s.label).join(', '),
    async write(text) {
      for (const sink of sinks) {
        await sink.write(text);
      }
    },
  };
}
