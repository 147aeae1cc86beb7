import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { Readable } from 'node:stream';
import { InvalidEncodingError, InvalidInputError } from '@scriptward/engine';
import { readScript } from '../utils/read-script.js';

describe('readScript', () => {
  let dir: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scriptward-read-'));
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reads a file', async () => {
    const file = path.join(dir, 'a.sh');
    fs.writeFileSync(file, '#!/bin/sh\necho ok\n');
    await expect(readScript(file)).resolves.toBe('#!/bin/sh\necho ok\n');
  });

  it('reads stdin for -', async () => {
    const stdin = Readable.from([Buffer.from('echo '), Buffer.from('hi\n')]);
    await expect(readScript('-', stdin)).resolves.toBe('echo hi\n');
  });

  it('rejects an empty file', async () => {
    const file = path.join(dir, 'empty.sh');
    fs.writeFileSync(file, '');
    await expect(readScript(file)).rejects.toThrow(InvalidInputError);
    await expect(readScript(file)).rejects.toThrow(`Script is empty: ${file}`);
  });

  it('rejects bytes that are not UTF-8', async () => {
    const file = path.join(dir, 'binary.sh');
    fs.writeFileSync(file, Buffer.from([0x23, 0x21, 0xff]));
    await expect(readScript(file)).rejects.toThrow(InvalidEncodingError);
  });
});
