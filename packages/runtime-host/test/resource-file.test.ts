/**
 * Resforge Runtime Host — ResourceFile Tests
 *
 *   RF-U1: default mode 'r+' requires an existing file
 *   RF-U2: universal newlines on read when no newline mode is given
 *   RF-U3: explicit newline modes translate on write only
 *   RF-U4: binary read and write
 *   RF-U5: mode and close checks
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PreconditionError } from '@resforge/kernel';
import { ResourceFile } from '../src/project/resource-file.js';

let dir: string;

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'resforge-rf-'));
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
});

describe('ResourceFile', () => {
  it('RF-U1: opening a missing file in the default mode fails with ENOENT', async () => {
    await expect(ResourceFile.open(join(dir, 'missing.dat'))).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('RF-U1: the default mode reads and writes in place', async () => {
    const path = join(dir, 'text.txt');
    writeFileSync(path, 'hello world', 'utf-8');

    const file = await ResourceFile.open(path);
    await file.writeText('HELLO');
    await file.close();

    expect(file.mode).toBe('r+');
    expect(readFileSync(path, 'utf-8')).toBe('HELLO world');
  });

  it('RF-U2: universal newlines convert CRLF and CR on read', async () => {
    const path = join(dir, 'lines.txt');
    writeFileSync(path, 'a\r\nb\rc\n', 'utf-8');

    const file = await ResourceFile.open(path, { mode: 'r' });
    const text = await file.readText();
    await file.close();

    expect(text).toBe('a\nb\nc\n');
  });

  it("RF-U2: newline '' leaves line endings alone", async () => {
    const path = join(dir, 'lines.txt');
    writeFileSync(path, 'a\r\nb\rc\n', 'utf-8');

    const file = await ResourceFile.open(path, { mode: 'r', newline: '' });
    const text = await file.readText();
    await file.close();

    expect(text).toBe('a\r\nb\rc\n');
  });

  it("RF-U3: newline '\\r\\n' translates on write", async () => {
    const path = join(dir, 'out.txt');

    const file = await ResourceFile.open(path, { mode: 'w', newline: '\r\n' });
    await file.writeText('one\ntwo\n');
    await file.close();

    expect(readFileSync(path, 'utf-8')).toBe('one\r\ntwo\r\n');
  });

  it('RF-U3: the default newline mode writes text as given', async () => {
    const path = join(dir, 'out.txt');

    const file = await ResourceFile.open(path, { mode: 'w' });
    await file.writeText('one\ntwo\r\n');
    await file.close();

    expect(readFileSync(path, 'utf-8')).toBe('one\ntwo\r\n');
  });

  it('RF-U3: the encoding applies to text', async () => {
    const path = join(dir, 'latin1.txt');

    const file = await ResourceFile.open(path, { mode: 'w', encoding: 'latin1' });
    await file.writeText('é');
    await file.close();

    expect([...readFileSync(path)]).toEqual([0xe9]);
  });

  it('RF-U4: bytes round-trip', async () => {
    const path = join(dir, 'blob.bin');

    const writer = await ResourceFile.open(path, { mode: 'w' });
    await writer.writeBytes(new Uint8Array([0, 1, 254, 255]));
    await writer.close();
    const reader = await ResourceFile.open(path, { mode: 'r' });
    const bytes = await reader.readBytes();
    await reader.close();

    expect([...bytes]).toEqual([0, 1, 254, 255]);
  });

  it("RF-U4: mode 'a' appends", async () => {
    const path = join(dir, 'log.txt');
    writeFileSync(path, 'first\n', 'utf-8');

    const file = await ResourceFile.open(path, { mode: 'a' });
    await file.writeText('second\n');
    await file.close();

    expect(readFileSync(path, 'utf-8')).toBe('first\nsecond\n');
  });

  it('RF-U5: reading a write-only file or writing a read-only file is a precondition error', async () => {
    const path = join(dir, 'data.dat');

    const writeOnly = await ResourceFile.open(path, { mode: 'w' });
    await expect(writeOnly.readText()).rejects.toBeInstanceOf(PreconditionError);
    await writeOnly.close();

    const readOnly = await ResourceFile.open(path, { mode: 'r' });
    await expect(readOnly.writeText('x')).rejects.toThrow(`Resource file ${path} is not open for writing (mode 'r')`);
    await readOnly.close();
  });

  it('RF-U5: close is idempotent and further use is rejected', async () => {
    const path = join(dir, 'data.dat');
    const file = await ResourceFile.open(path, { mode: 'w+' });

    await file.close();
    await file.close();

    expect(file.isClosed).toBe(true);
    await expect(file.writeText('x')).rejects.toThrow(`Resource file ${path} is closed`);
  });
});
