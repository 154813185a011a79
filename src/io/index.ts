/**
 * File wrappers for loading and saving documents.
 *
 * @packageDocumentation
 */

export { FileError, loadDocument, saveDocument } from './file.js';

export type { FileOperation } from './file.js';
