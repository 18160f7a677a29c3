import { readFileSync } from 'fs';
import { join } from 'path';

/**
 * Project root assets directory (same relative position from src/ and dist/)
 */
export const ASSETS_DIR = join(__dirname, '..', '..', 'assets');

export function loadTranscriptStylesheet(): string {
  return readFileSync(join(ASSETS_DIR, 'transcript.css'), 'utf-8');
}
