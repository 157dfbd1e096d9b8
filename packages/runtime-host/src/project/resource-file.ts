/**
 * Resforge Runtime Host — Resource File Handle
 *
 * A caller-owned open file returned by Project.getResource(). Wraps a
 * node:fs/promises FileHandle with text encoding and newline translation.
 *
 * Newline handling:
 *
 *   newline      read                           write
 *   ---------    ----------------------------   ---------------------------
 *   undefined    '\r\n' and '\r' become '\n'    as is
 *   ''           as is                          as is
 *   '\n'         as is                          as is
 *   '\r\n'       as is                          '\n' becomes '\r\n'
 *   '\r'         as is                          '\n' becomes '\r'
 *
 * The caller must close() the file. Nothing in the project core closes it.
 */

import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { PreconditionError } from '@resforge/kernel';

export type ResourceFileMode = 'r' | 'r+' | 'w' | 'w+' | 'a' | 'a+';

export type NewlineMode = '' | '\n' | '\r\n' | '\r';

export interface ResourceFileOptions {
  /** Default 'r+': read and write an existing file. */
  readonly mode?: ResourceFileMode | undefined;
  /** Text encoding for readText/writeText. Default 'utf-8'. */
  readonly encoding?: BufferEncoding | undefined;
  readonly newline?: NewlineMode | undefined;
}

export const DEFAULT_RESOURCE_FILE_MODE: ResourceFileMode = 'r+';

const READABLE_MODES: ReadonlySet<ResourceFileMode> = new Set(['r', 'r+', 'w+', 'a+']);

export class ResourceFile {
  private closed = false;

  private constructor(
    readonly path: string,
    readonly handle: FileHandle,
    readonly mode: ResourceFileMode,
    readonly encoding: BufferEncoding,
    readonly newline: NewlineMode | undefined,
  ) {}

  /**
   * Open `path` with the given options. Errors from the file system (e.g.
   * ENOENT for mode 'r' or 'r+' on a missing file) propagate unchanged.
   */
  static async open(path: string, options: ResourceFileOptions = {}): Promise<ResourceFile> {
    const mode = options.mode ?? DEFAULT_RESOURCE_FILE_MODE;
    const handle = await open(path, mode);
    return new ResourceFile(path, handle, mode, options.encoding ?? 'utf-8', options.newline);
  }

  get readable(): boolean {
    return READABLE_MODES.has(this.mode);
  }

  get writable(): boolean {
    return this.mode !== 'r';
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /** Read from the current position to the end of the file as text. */
  async readText(): Promise<string> {
    const text = (await this.readBytes()).toString(this.encoding);
    return this.newline === undefined ? text.replace(/\r\n?/g, '\n') : text;
  }

  async writeText(text: string): Promise<void> {
    const translated =
      this.newline === '\r\n' || this.newline === '\r' ? text.replace(/\n/g, this.newline) : text;
    await this.writeBytes(Buffer.from(translated, this.encoding));
  }

  /** Read from the current position to the end of the file. */
  async readBytes(): Promise<Buffer> {
    this.requireOpen();
    if (!this.readable) {
      throw new PreconditionError(`Resource file ${this.path} is not open for reading (mode '${this.mode}')`);
    }
    return this.handle.readFile();
  }

  async writeBytes(bytes: Uint8Array): Promise<void> {
    this.requireOpen();
    if (!this.writable) {
      throw new PreconditionError(`Resource file ${this.path} is not open for writing (mode '${this.mode}')`);
    }
    await this.handle.write(bytes);
  }

  /** Close the underlying handle. Closing twice is a no-op. */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.handle.close();
  }

  private requireOpen(): void {
    if (this.closed) {
      throw new PreconditionError(`Resource file ${this.path} is closed`);
    }
  }
}
