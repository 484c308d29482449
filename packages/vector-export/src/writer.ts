/**
 * Line-oriented text buffer.
 *
 * Chunks are collected in an array and joined once in `finish`, so building a
 * document with thousands of elements stays linear.
 */
export class DocumentWriter {
  private readonly chunks: string[] = []

  /** Append one line (without its terminator). */
  line(text: string): this {
    this.chunks.push(text)
    return this
  }

  lines(texts: Iterable<string>): this {
    for (const text of texts) this.chunks.push(text)
    return this
  }

  get lineCount(): number {
    return this.chunks.length
  }

  /** Join all lines with `\n`. */
  finish(trailingNewline = false): string {
    const body = this.chunks.join('\n')
    return trailingNewline ? body + '\n' : body
  }
}
