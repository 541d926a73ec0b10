import type { Layout } from '../../Layout.js';

/** Options shared by layout loaders. */
export interface LoaderOptions {
  /** Column delimiter character (e.g. `','`, `';'`, `'\t'`). Default: auto-detected. */
  readonly delimiter?: string;
  /** Character encoding used to decode Buffer input. Default: `'utf-8'`. */
  readonly encoding?: BufferEncoding;
}

/**
 * Port for declaring schemas from an external description.
 *
 * Implement this interface to read layouts from new formats. `load()`
 * declares every schema it reads on `layout` and returns it.
 */
export interface LayoutLoader {
  load(data: string | Buffer, layout?: Layout): Layout;
}
