import { buildBlocks } from './blocks';
import { ExtractionConfig } from './config';
import { locateHeader } from './header';
import { ContentNode } from './ingest/types';
import { Logger, silentLogger } from './logger';
import { assemble } from './record';
import { locateSections } from './sections';
import { ExtractedRecord } from './types';

export interface ExtractOptions {
  logger?: Logger;
}

/**
 * Runs one document's content tree through the block builder and both locators.
 * Throws HeaderNotFoundError or MalformedScanError; missing fields come back empty.
 */
export function extractRecord(
  nodes: readonly ContentNode[],
  source: string,
  config: ExtractionConfig,
  opts: ExtractOptions = {},
): ExtractedRecord {
  const log = (opts.logger ?? silentLogger).child({ file: source });
  const blocks = buildBlocks(nodes, { logger: log });
  const locate = { logger: log, scanFactor: config.scanFactor };
  const header = locateHeader(blocks, config.header, locate);
  const sections = locateSections(blocks, config.sections, locate);
  log.debug('extract.record', { blocks: blocks.length });
  return assemble(header, sections, source);
}
