import { parseRecordRows } from '@ledgerjob/output';
import { createPatternRule, type Rule } from '@ledgerjob/rules';
import { FormatError, type SourceConfig } from '@ledgerjob/types';
import type { ExtractionSource, RawTransactionFields } from './extraction-source.js';
import type { PageDocument } from './page-fetcher.js';
import { parseSourceProfile, type SourceProfile, type SourceProfileInput } from './profile.js';
import { createSourceConfig } from './source-config.js';

/**
 * Reads CSV/TSV exports laid out as a profile describes. Blank rows are skipped;
 * oldest-first exports are reversed so transactions come out most recent first.
 */
export class DelimitedSource implements ExtractionSource {
  readonly name: string;
  readonly config: Readonly<SourceConfig>;
  readonly location: string | undefined;
  private readonly profile: SourceProfile;
  private readonly compiledRules: Rule[];

  constructor(profile: SourceProfileInput) {
    this.profile = parseSourceProfile(profile);
    this.name = this.profile.name;
    this.location = this.profile.location;
    this.config = createSourceConfig(this.profile.config);
    this.compiledRules = this.profile.rules.map((definition) => createPatternRule(definition));
  }

  rules(): readonly Rule[] {
    return this.compiledRules;
  }

  extract(document: PageDocument): RawTransactionFields[] {
    const { columns, delimiter, headerRows, order } = this.profile;
    const rows = parseRecordRows(document.body, delimiter).slice(headerRows);

    const records: RawTransactionFields[] = [];
    rows.forEach((row, index) => {
      if (row.every((cell) => cell.trim() === '')) {
        return;
      }
      const rowNumber = index + headerRows + 1;
      const cell = (column: number, field: string): string => {
        const value = row[column];
        if (value === undefined) {
          throw new FormatError(
            `${document.location}: row ${rowNumber} has ${row.length} field(s), ${field} expected in column ${column}`,
            row
          );
        }
        return value;
      };

      records.push({
        date: cell(columns.date, 'date'),
        description: cell(columns.description, 'description'),
        amount: cell(columns.amount, 'amount'),
        ...(columns.valueDate !== undefined ? { valueDate: cell(columns.valueDate, 'value date') } : {}),
        ...(columns.newBalance !== undefined ? { newBalance: cell(columns.newBalance, 'new balance') } : {}),
      });
    });

    return order === 'oldest-first' ? records.reverse() : records;
  }
}
