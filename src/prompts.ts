/**
 * Versioned classification prompt templates.
 * Templates live in prompts/analysis-<version>.txt at the package root.
 */

import fs from 'node:fs/promises';
import path from 'node:path';
import url from 'node:url';

const __dirname = path.dirname(url.fileURLToPath(import.meta.url));
const PROMPT_DIR = path.join(__dirname, '..', 'prompts');

const cache = new Map<string, string>();

export async function loadPromptTemplate(version: string): Promise<string> {
  const cached = cache.get(version);
  if (cached !== undefined) return cached;

  if (!/^[\w.-]+$/.test(version)) {
    throw new Error(`Invalid prompt version: ${version}`);
  }

  const template = await fs.readFile(
    path.join(PROMPT_DIR, `analysis-${version}.txt`),
    'utf-8'
  );
  cache.set(version, template);
  return template;
}

export function renderPrompt(
  template: string,
  vars: { currentDate: Date; language: string }
): string {
  return template
    .replaceAll('{{CURRENT_DATE}}', vars.currentDate.toISOString().slice(0, 10))
    .replaceAll('{{LANGUAGE}}', vars.language);
}
