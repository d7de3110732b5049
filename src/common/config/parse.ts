// src/common/config/parse.ts
import YAML from 'yaml';

/**
 * Parse configuration text by file extension: JSON for ".json", YAML
 * otherwise. Syntax errors are rethrown with the file path in front.
 */
export const parseText = (p: string, text: string): unknown => {
  try {
    return p.endsWith('.json')
      ? (JSON.parse(text) as unknown)
      : (YAML.parse(text) as unknown);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`cannot parse ${p.replace(/\\/g, '/')}: ${msg}`);
  }
};
