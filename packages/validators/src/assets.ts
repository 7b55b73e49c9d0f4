import { readFileSync } from 'node:fs';
import { ConfigurationError } from '@einvoice-fr/shared';

/**
 * Reads a JSON document shipped with the package (schemas/, rules/).
 */
export function readJsonAsset(relativePath: string): unknown {
  const url = new URL(`../${relativePath}`, import.meta.url);
  let text: string;
  try {
    text = readFileSync(url, 'utf8');
  } catch (error) {
    throw new ConfigurationError(`Validation asset not found: ${relativePath}`, {
      asset: relativePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (error) {
    throw new ConfigurationError(`Validation asset is not valid JSON: ${relativePath}`, {
      asset: relativePath,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}
