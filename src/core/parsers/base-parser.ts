/**
 * Base contract for structural and encryption-marker parsers.
 *
 * Each parser inspects one family's container through a {@link ReadableSource}
 * and returns a flat feature record. Internally `inspect()` may throw on
 * truncated or malformed input; {@link FormatParser.run} turns that into a
 * {@link ParseResult}, and {@link FormatParser.parse} collapses a failure to
 * the family's default record. Callers of `parse()` never see an exception.
 */

import type { FeatureMap } from '../../shared/types'
import type { ReadableSource } from '../io/readable-source'

export type ParseErrorCode = 'TRUNCATED' | 'BAD_SIGNATURE' | 'MALFORMED' | 'IO'

export class ParseError extends Error {
  public readonly code: ParseErrorCode
  public override readonly cause?: unknown

  constructor(message: string, code: ParseErrorCode, cause?: unknown) {
    super(message)
    this.name = 'ParseError'
    this.code = code
    this.cause = cause
  }

  /** Wrap anything thrown inside a parser. */
  static from(err: unknown): ParseError {
    if (err instanceof ParseError) return err
    if (err instanceof RangeError) {
      return new ParseError(err.message, 'TRUNCATED', err)
    }
    const message = err instanceof Error ? err.message : String(err)
    return new ParseError(message, 'IO', err)
  }
}

export type ParseResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ParseError }

/** Interface every registered parser implements. */
export interface FeatureParser<T extends FeatureMap = FeatureMap> {
  /** Human-readable name of this parser (for logging). */
  readonly name: string
  /** Registry key: a format family, or `<family>_enc` for encryption parsers. */
  readonly family: string
  /** The record reported when the input cannot be parsed at all. */
  defaults(): T
  /** Inspect the source, reporting failures as a result value. */
  run(source: ReadableSource): Promise<ParseResult<T>>
  /** Inspect the source; never throws. */
  parse(source: ReadableSource): Promise<T>
}

export abstract class FormatParser<T extends FeatureMap> implements FeatureParser<T> {
  abstract readonly name: string
  abstract readonly family: string

  abstract defaults(): T

  /** Format-specific inspection. May throw; see {@link run}. */
  protected abstract inspect(source: ReadableSource): Promise<T>

  async run(source: ReadableSource): Promise<ParseResult<T>> {
    try {
      return { ok: true, value: await this.inspect(source) }
    } catch (err) {
      return { ok: false, error: ParseError.from(err) }
    }
  }

  async parse(source: ReadableSource): Promise<T> {
    const result = await this.run(source)
    return result.ok ? result.value : this.defaults()
  }
}
