import * as fs from 'node:fs/promises';
import { InvalidInputError, decodeScript } from '@scriptward/engine';

async function readStream(stream: NodeJS.ReadableStream): Promise<Uint8Array> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Read a script file, or stdin for `-`, and decode it as UTF-8
 */
export async function readScript(
  source: string,
  stdin: NodeJS.ReadableStream = process.stdin,
): Promise<string> {
  const bytes = source === '-' ? await readStream(stdin) : await fs.readFile(source);
  if (bytes.byteLength === 0) {
    throw new InvalidInputError(`Script is empty: ${source === '-' ? '<stdin>' : source}`);
  }
  return decodeScript(bytes, bytes.byteLength);
}
