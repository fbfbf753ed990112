import { SourceFormat } from '../entities/trade-record.entity';
import { parseContractNote } from './contract-note.parser';
import { parseCostInfo } from './cost-info.parser';
import { FormatParser } from './parser.util';
import { parseStatement } from './statement.parser';

export const FORMAT_PARSERS: Record<SourceFormat, FormatParser> = {
  [SourceFormat.STATEMENT]: parseStatement,
  [SourceFormat.CONTRACT_NOTE]: parseContractNote,
  [SourceFormat.COST_INFO]: parseCostInfo,
};

export type { FormatParser } from './parser.util';
