/**
 * OLE2 / Compound File Binary Parser
 *
 * Checks that the sector-allocation structures of a compound file can be
 * followed: the FAT assembled through the DIFAT, the directory stream
 * reached through the FAT, and the first MiniFAT sector when one is declared.
 * Directory entries are only classified, never used to open streams.
 */

import type { StructuralFlags } from '../../../shared/types'
import type { ReadableSource } from '../../io/readable-source'
import {
  CFB_HEADER_SIZE,
  buildFat,
  followChain,
  miniFatReadable,
  parseCfbHeader,
  scanDirectory
} from '../../formats/compound-file'
import { FormatParser } from '../base-parser'

export type Ole2Features = StructuralFlags & {
  ole_dir_ok: boolean
  ole_stream_count: number
  ole_fat_ok: boolean
  ole_mini_fat_ok: boolean
  ole_root_entry_present: boolean
  ole_summaryinfo_present: boolean
  ole_expected_streams_present: boolean
}

export class Ole2Parser extends FormatParser<Ole2Features> {
  readonly name = 'OLE2 Parser'
  readonly family = 'ole2'

  defaults(): Ole2Features {
    return {
      ole_dir_ok: false,
      ole_stream_count: 0,
      ole_fat_ok: false,
      ole_mini_fat_ok: false,
      ole_root_entry_present: false,
      ole_summaryinfo_present: false,
      ole_expected_streams_present: false,
      parser_ok: false,
      structure_consistent: false
    }
  }

  protected async inspect(source: ReadableSource): Promise<Ole2Features> {
    const header = parseCfbHeader(await source.read(0, CFB_HEADER_SIZE))
    if (!header) {
      return this.defaults()
    }

    const fat = await buildFat(source, header)
    const dirStream = await followChain(source, header.sectorSize, fat.entries, header.firstDirSector)
    const dir = scanDirectory(dirStream, header.sectorSize)
    const miniFatOk = await miniFatReadable(source, header)

    const parserOk = dir.ok && dir.rootPresent && fat.ok && dir.streamCount >= 1
    return {
      ole_dir_ok: dir.ok,
      ole_stream_count: dir.streamCount,
      ole_fat_ok: fat.ok,
      ole_mini_fat_ok: miniFatOk,
      ole_root_entry_present: dir.rootPresent,
      ole_summaryinfo_present: dir.summaryInfoPresent,
      ole_expected_streams_present: dir.applicationStreamPresent,
      parser_ok: parserOk,
      structure_consistent:
        parserOk &&
        (dir.applicationStreamPresent || dir.summaryInfoPresent) &&
        (miniFatOk || dir.streamCount <= 1)
    }
  }
}
