/**
 * Usage text printed for `-h` and for an empty command line.
 */

import { BACKENDS } from '../backends/index.js';
import { getEnvVarDocumentation } from '../config/index.js';

const KEY_WIDTH = 20;

export function usageText(): string {
  const lines = [
    'usage: ifgen [-p <root path>] -o <output path> -L <backend> (-r <package:path root>)+ [-t] [-v] fqname+',
    '         -h: Prints this menu.',
    '         -L <backend>: The following options are available:',
    ...BACKENDS.map((backend) => `            ${backend.key.padEnd(KEY_WIDTH)}: ${backend.description}`),
    '         -o <output path>: Location to output files.',
    '         -p <root path>: Build root, defaults to $IFGEN_BUILD_TOP or the working directory.',
    '         -r <package:path root>: E.g., vendor.acme:vendor/acme/interfaces.',
    '         -t: Generate build descriptors for tests (-Landroidbp only).',
    '         -v: Verbose output; logs every file touched.',
    '',
    'environment:',
  ];
  for (const [name, doc] of Object.entries(getEnvVarDocumentation())) {
    lines.push(`         ${name}: ${doc.description}`);
  }
  return lines.join('\n') + '\n';
}
