import { Injectable, Logger } from '@nestjs/common';
import { parse } from 'csv-parse/sync';
import { DecodeFailure, getErrorMessage } from '../common/import-errors';
import { DecodedTable } from '../inventory/inventory.types';

interface EncodingCandidate {
  label: string;
  decode: (bytes: Buffer) => string | null;
}

// C1 controls never appear in hand-authored text; seeing them means the bytes
// belong to another single-byte code page.
const C1_CONTROLS = /[\u0080-\u009f]/;
// Bytes left undefined by Windows-1252 decode to these code points.
const CP1252_UNDEFINED = /[\u0081\u008d\u008f\u0090\u009d]/;

@Injectable()
export class DecoderService {
  private readonly logger = new Logger(DecoderService.name);

  private readonly candidates: EncodingCandidate[] = [
    { label: 'utf-8', decode: (bytes) => this.decodeUtf8(bytes) },
    { label: 'iso-8859-1', decode: (bytes) => this.decodeLatin1(bytes) },
    { label: 'windows-1252', decode: (bytes) => this.decodeWindows1252(bytes) },
  ];

  get encodingLabels(): string[] {
    return this.candidates.map((candidate) => candidate.label);
  }

  decode(bytes: Buffer): DecodedTable {
    for (const candidate of this.candidates) {
      const text = candidate.decode(bytes);
      if (text == null) {
        continue;
      }

      this.logger.debug(`Decoded ${bytes.length} bytes as ${candidate.label}`);
      return { rows: this.splitRows(text, candidate.label), encoding: candidate.label };
    }

    throw new DecodeFailure(this.encodingLabels);
  }

  private splitRows(text: string, encoding: string): string[][] {
    let records: unknown;
    try {
      records = parse(text, {
        relax_column_count: true,
        relax_quotes: true,
        skip_empty_lines: false,
      });
    } catch (error: unknown) {
      throw new DecodeFailure([encoding], getErrorMessage(error));
    }

    if (!isStringGrid(records)) {
      throw new DecodeFailure([encoding], 'unexpected CSV parser output');
    }

    return records;
  }

  private decodeUtf8(bytes: Buffer): string | null {
    try {
      // A leading byte-order mark is consumed by the decoder.
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
      return null;
    }
  }

  private decodeLatin1(bytes: Buffer): string | null {
    const text = bytes.toString('latin1');
    return C1_CONTROLS.test(text) ? null : text;
  }

  private decodeWindows1252(bytes: Buffer): string | null {
    const text = new TextDecoder('windows-1252').decode(bytes);
    return CP1252_UNDEFINED.test(text) ? null : text;
  }
}

function isStringGrid(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every(
      (row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'),
    )
  );
}
