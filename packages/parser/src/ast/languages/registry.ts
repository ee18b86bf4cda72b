import { extname } from 'path';
import type { LanguageDefinition, SupportedLanguage } from './types.js';
import { pythonDefinition } from './python.js';
import { typescriptDefinition, tsxDefinition } from './typescript.js';
import { javascriptDefinition } from './javascript.js';

export type { SupportedLanguage } from './types.js';

const definitions = {
  python: pythonDefinition,
  typescript: typescriptDefinition,
  tsx: tsxDefinition,
  javascript: javascriptDefinition,
} satisfies Record<SupportedLanguage, LanguageDefinition>;

/** Lowercase extension (no dot) → language; first definition wins */
const byExtension = new Map<string, SupportedLanguage>();
for (const definition of Object.values(definitions)) {
  for (const ext of definition.extensions) {
    if (!byExtension.has(ext)) byExtension.set(ext, definition.id);
  }
}

export function getLanguage(language: SupportedLanguage): LanguageDefinition {
  return definitions[language];
}

/**
 * Language for a path by its extension (case-insensitive), or null when
 * crapscore does not analyze that kind of file.
 */
export function detectLanguage(filePath: string): SupportedLanguage | null {
  return byExtension.get(extname(filePath).slice(1).toLowerCase()) ?? null;
}

/** Extensions the scanner should pick up, in registration order */
export function getSupportedExtensions(): string[] {
  return [...byExtension.keys()];
}
