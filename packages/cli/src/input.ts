import fs from 'node:fs';
import { InputUnavailableError } from './errors.js';

/**
 * Read a whole dump, failing before any processing if the path is not a
 * readable regular file.
 */
export function readInputFile(filePath: string): string {
  try {
    fs.accessSync(filePath, fs.constants.R_OK);
    if (!fs.statSync(filePath).isFile()) {
      throw new Error(`${filePath} is not a regular file`);
    }
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new InputUnavailableError(filePath, { cause: err });
  }
}
