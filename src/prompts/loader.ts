import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { errorMessage } from '../utils.js';

// Templates live in <package>/prompts, two levels up from both src/prompts and dist/prompts.
const PROMPTS_DIR = new URL('../../prompts/', import.meta.url);

function readTemplate(fileName: string): string {
  const location = fileURLToPath(new URL(fileName, PROMPTS_DIR));
  try {
    return readFileSync(location, 'utf-8').trimEnd();
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    throw new Error(missing ? `prompt file not found: ${location}` : `failed to read prompt file ${location}: ${errorMessage(error)}`);
  }
}

/** Default coding-agent prompt; `${SYSTEM_CONTEXT}` marks where the system block goes. */
export const DEFAULT_SYSTEM_PROMPT_TEMPLATE = readTemplate('system-prompt.md');
export const SYSTEM_CONTEXT_TEMPLATE = readTemplate('system-context.md');
