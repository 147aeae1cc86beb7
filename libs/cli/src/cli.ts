#!/usr/bin/env node
/**
 * Scriptward CLI
 *
 * Classifies, validates, highlights and runs interpreter scripts.
 *
 * @example
 * ```bash
 * # Show help
 * scriptward --help
 *
 * # Check a maintainer script before installing
 * scriptward validate ./postinst
 *
 * # Colored listing with the vim scheme
 * scriptward highlight --scheme vim ./configure.sh
 * ```
 */

import { ConfigError } from '@scriptward/engine';
import { createProgram } from './program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    if (err instanceof ConfigError) {
      err.issues.forEach((issue) => console.error(`  - ${issue}`));
    }
    process.exit(1);
  }
}

main().catch((err) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
