import fs from 'node:fs';
import { z } from 'zod';

const manifestSchema = z.object({ version: z.string() });

// Resolves to the package root from both src/ and dist/.
const manifest = fs.readFileSync(new URL('../package.json', import.meta.url), 'utf8');

export const VERSION = manifestSchema.parse(JSON.parse(manifest)).version;
