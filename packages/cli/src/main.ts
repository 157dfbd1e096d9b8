/**
 * main.ts — run the `resforge` program against an argv.
 *
 * src/bin/resforge.ts calls this with process.argv. The workspace packages
 * export their TypeScript sources, so the CLI runs from source through a
 * TypeScript loader (`npm run resforge -- <args>`), not from a tsc build.
 */

import { createProgram } from './commands/index.js'

export async function main(argv: ReadonlyArray<string> = process.argv): Promise<void> {
  await createProgram().parseAsync([...argv])
}
