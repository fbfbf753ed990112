import { readFileSync } from 'fs';
import { join } from 'path';

/** Raw text of a document as the PDF extraction would deliver it. */
export function loadFixture(name: string): string {
  return readFileSync(join(__dirname, 'fixtures', name), 'utf8');
}
