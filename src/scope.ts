/**
 * Scoped use of a writer: release on every exit path.
 */

/** Anything with a synchronous `close()`. */
export interface Closable {
  close(): unknown;
}

/**
 * Run `fn` with `writer`, then close the writer whether `fn` returned or threw.
 *
 * @example
 * ```ts
 * const rows = withWriter(new CsvWriter(), (csv) => {
 *   csv.openWithFieldNames('out.csv', ['id', 'name']);
 *   csv.writeRecords(data);
 *   return data.length;
 * });
 * ```
 */
export function withWriter<W extends Closable, T>(writer: W, fn: (writer: W) => T): T {
  try {
    return fn(writer);
  } finally {
    writer.close();
  }
}
