/**
 * OOXML Parser
 *
 * Office Open XML packages (docx, xlsx, pptx) are ZIP archives carrying a
 * `[Content_Types].xml` part plus a main part under word/, xl/ or ppt/.
 * The archive is listed strictly; a damaged central directory yields the
 * default record.
 */

import type { StructuralFlags } from '../../../shared/types'
import type { ReadableSource } from '../../io/readable-source'
import { listArchive, readEntryHead } from '../../formats/zip-archive'
import type { CentralDirectoryEntry } from '../../formats/zip-archive'
import { FormatParser, ParseError } from '../base-parser'
import { CONTENT_TYPES_NAME } from './zip-parser'

export type OoxmlFeatures = StructuralFlags & {
  ooxml_detected: boolean
  ooxml_coreparts_present: boolean
  ooxml_rel_count: number
  ooxml_pkg_ok: boolean
}

export const CORE_PARTS: readonly string[] = [
  'word/document.xml',
  'xl/workbook.xml',
  'ppt/presentation.xml'
]

export const OOXML_DIR_PREFIXES: readonly string[] = ['word/', 'xl/', 'ppt/']

/** Relationship parts are counted up to this many, then reported as one more. */
const RELS_EARLY_STOP = 20

/** Leading bytes of [Content_Types].xml searched for the Types element. */
const CONTENT_TYPES_SCAN_BYTES = 4096

export function hasOoxmlDirectory(names: Iterable<string>): boolean {
  for (const name of names) {
    if (OOXML_DIR_PREFIXES.some(p => name.startsWith(p))) return true
  }
  return false
}

function countRels(names: readonly string[]): number {
  let count = 0
  for (const name of names) {
    if (name.endsWith('.rels') || name.endsWith('.RELS')) {
      count++
      if (count > RELS_EARLY_STOP) return RELS_EARLY_STOP + 1
    }
  }
  return count
}

export class OoxmlParser extends FormatParser<OoxmlFeatures> {
  readonly name = 'OOXML Parser'
  readonly family = 'ooxml'

  defaults(): OoxmlFeatures {
    return {
      ooxml_detected: false,
      ooxml_coreparts_present: false,
      ooxml_rel_count: 0,
      ooxml_pkg_ok: false,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<OoxmlFeatures> {
    const entries = await listArchive(source)
    const names = entries.map(e => e.name)
    const nameSet = new Set(names)

    const hasContentTypes = nameSet.has(CONTENT_TYPES_NAME)
    const corePresent = CORE_PARTS.some(p => nameSet.has(p))
    const hasDirs = hasOoxmlDirectory(nameSet)
    const detected = hasContentTypes && (corePresent || hasDirs)
    const relCount = countRels(names)

    let pkgOk = false
    if (hasContentTypes && (corePresent || hasDirs)) {
      pkgOk = await this.contentTypesDeclared(source, entries)
    }

    const parserOk = detected && pkgOk && (corePresent || relCount > 0)
    return {
      ooxml_detected: detected,
      ooxml_coreparts_present: corePresent,
      ooxml_rel_count: relCount,
      ooxml_pkg_ok: pkgOk,
      parser_ok: parserOk,
      structure_consistent: parserOk && corePresent && relCount >= 2
    }
  }

  /** True when the head of [Content_Types].xml holds a Types element. */
  private async contentTypesDeclared(
    source: ReadableSource,
    entries: readonly CentralDirectoryEntry[]
  ): Promise<boolean> {
    // Later duplicates shadow earlier ones, as in archive libraries.
    const entry = [...entries].reverse().find(e => e.name === CONTENT_TYPES_NAME)
    if (!entry) return false

    try {
      const head = await readEntryHead(source, entry, CONTENT_TYPES_SCAN_BYTES)
      return head.includes('<Types') || head.includes(':Types')
    } catch (err) {
      // Encrypted, unsupported or damaged part: the package is not usable.
      if (err instanceof ParseError) return false
      throw err
    }
  }
}
