/**
 * Sniffer
 *
 * Classifies a file's container family from its head window:
 *   - `format_family` picks the structural parser, tested in priority order
 *     and restricted to the families enabled in the configuration. A ZIP
 *     resolves to `ooxml` when its listing holds `[Content_Types].xml` and a
 *     word/, xl/ or ppt/ entry.
 *   - `magic_ok` / `magic_family` report any recognized magic, including
 *     formats without a parser, regardless of configuration.
 */

import type { FormatFamily, MagicFamily, SniffResult, SnifferConfig } from '../../shared/types'
import { ALL_FORMAT_FAMILIES } from '../../shared/types'
import {
  DEFAULT_SNIFF_WINDOW,
  MAGIC_ONLY_SIGNATURES,
  PARSER_SIGNATURES,
  TAR_MIN_LENGTH,
  isTar
} from '../../shared/constants/file-signatures'
import type { ReadableSource } from '../io/readable-source'
import { readHead, readTail } from '../io/readable-source'
import { withBlockReader } from '../io/block-reader'
import { listArchive } from '../formats/zip-archive'
import { ParseError } from '../parsers/base-parser'
import { hasOoxmlDirectory } from '../parsers/structural/ooxml-parser'
import { CONTENT_TYPES_NAME } from '../parsers/structural/zip-parser'

export const DEFAULT_SNIFFER_CONFIG: SnifferConfig = {
  headBytes: DEFAULT_SNIFF_WINDOW,
  tailBytes: DEFAULT_SNIFF_WINDOW,
  enabledFamilies: new Set(ALL_FORMAT_FAMILIES)
}

/** `log10(size + 1)`, and exactly 0 for an empty file. */
export function logSize(size: number): number {
  return size > 0 ? Math.log10(size + 1) : 0
}

/**
 * Lightweight OOXML probe: a strict archive listing, no decompression.
 * A listing that cannot be produced means "not OOXML".
 */
export async function zipLooksLikeOoxml(source: ReadableSource): Promise<boolean> {
  let names: string[]
  try {
    names = (await listArchive(source)).map(e => e.name)
  } catch (err) {
    if (err instanceof ParseError) return false
    throw err
  }
  return names.includes(CONTENT_TYPES_NAME) && hasOoxmlDirectory(names)
}

export class Sniffer {
  constructor(private readonly config: SnifferConfig = DEFAULT_SNIFFER_CONFIG) {}

  async sniff(source: ReadableSource): Promise<SniffResult> {
    const size = source.size
    const head = await readHead(source, this.config.headBytes)
    const tail = size >= this.config.tailBytes ? await readTail(source, this.config.tailBytes) : head

    const matched = PARSER_SIGNATURES.find(sig => sig.matches(head))

    // The archive listing is needed at most once per file.
    let ooxml: boolean | undefined
    const isOoxml = async (): Promise<boolean> => {
      ooxml ??= await zipLooksLikeOoxml(source)
      return ooxml
    }

    const enabledMatch = PARSER_SIGNATURES.find(sig => this.isEnabled(sig.family) && sig.matches(head))
    const formatFamily = await this.resolveFamily(enabledMatch?.family, isOoxml)

    let magicFamily: MagicFamily = 'unknown'
    if (matched) {
      magicFamily = matched.family === 'zip' && (await isOoxml()) ? 'ooxml' : matched.family
    } else {
      const tarBlob = head.length >= TAR_MIN_LENGTH ? head : Buffer.concat([head, tail])
      const other = MAGIC_ONLY_SIGNATURES.find(sig =>
        sig.family === 'tar' ? isTar(tarBlob) : sig.matches(head)
      )
      if (other) magicFamily = other.family
    }

    return {
      format_family: formatFamily,
      magic_ok: magicFamily !== 'unknown',
      magic_family: magicFamily,
      size_bytes: size,
      log_size: logSize(size)
    }
  }

  /** A ZIP signature is worth resolving when either ZIP or OOXML is enabled. */
  private isEnabled(family: FormatFamily): boolean {
    const enabled = this.config.enabledFamilies
    return enabled.has(family) || (family === 'zip' && enabled.has('ooxml'))
  }

  private async resolveFamily(
    family: FormatFamily | undefined,
    isOoxml: () => Promise<boolean>
  ): Promise<FormatFamily | 'other'> {
    if (!family) return 'other'
    if (family !== 'zip') return family

    const enabled = this.config.enabledFamilies
    if (enabled.has('ooxml') && (await isOoxml())) return 'ooxml'
    return enabled.has('zip') ? 'zip' : 'other'
  }
}

/** Sniff a file on disk. */
export function sniffFile(path: string, config?: SnifferConfig): Promise<SniffResult> {
  const sniffer = new Sniffer(config)
  return withBlockReader(path, reader => sniffer.sniff(reader))
}
