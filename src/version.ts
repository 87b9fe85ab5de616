/**
 * Package version
 * Read from package.json next to the source (src/) or build (dist/) directory
 */

import * as fs from 'fs';

const pkg: unknown = JSON.parse(fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8'));

export const VERSION =
    typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string' ? pkg.version : '0.0.0';
