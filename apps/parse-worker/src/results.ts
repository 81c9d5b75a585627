import { mkdir, writeFile } from 'node:fs/promises';
import { join, parse } from 'node:path';
import { writeToString } from '@fast-csv/format';
import { DEFAULT_LOW_CONFIDENCE_THRESHOLD } from './pipeline.js';
import type { StructuredOutput } from './types.js';

export type ValidationRow = {
  filename: string;
  field_name: string;
  extracted_value: string;
  confidence: number;
};

export interface SaveResultsOptions {
  saveRawText?: boolean;
  saveJson?: boolean;
  lowConfidenceThreshold?: number;
}

export function toStructuredJson(output: StructuredOutput): string {
  return JSON.stringify(output, null, 2);
}

export function buildValidationRows(
  outputs: StructuredOutput[],
  threshold: number = DEFAULT_LOW_CONFIDENCE_THRESHOLD
): ValidationRow[] {
  return outputs.flatMap((output) =>
    output.extractedFields
      .filter((field) => field.confidence < threshold)
      .map((field) => ({
        filename: output.filename,
        field_name: field.name,
        extracted_value: field.value ?? '',
        confidence: field.confidence,
      }))
  );
}

export function toValidationCsv(rows: ValidationRow[]): Promise<string> {
  return writeToString(rows, { headers: ['filename', 'field_name', 'extracted_value', 'confidence'] });
}

/**
 * Writes `<name>_raw.txt` and `<name>_structured.json` per document, plus a
 * `validation_list.csv` when any field falls under the threshold. Returns the
 * written paths.
 */
export async function saveResults(
  outputs: StructuredOutput[],
  outputDir: string,
  options: SaveResultsOptions = {}
): Promise<string[]> {
  const { saveRawText = true, saveJson = true } = options;
  await mkdir(outputDir, { recursive: true });
  const written: string[] = [];

  for (const output of outputs) {
    const stem = parse(output.filename).name;
    if (saveRawText) {
      const rawPath = join(outputDir, `${stem}_raw.txt`);
      await writeFile(rawPath, output.rawText, 'utf-8');
      written.push(rawPath);
    }
    if (saveJson) {
      const jsonPath = join(outputDir, `${stem}_structured.json`);
      await writeFile(jsonPath, toStructuredJson(output), 'utf-8');
      written.push(jsonPath);
    }
  }

  const rows = buildValidationRows(outputs, options.lowConfidenceThreshold);
  if (rows.length) {
    const csvPath = join(outputDir, 'validation_list.csv');
    await writeFile(csvPath, await toValidationCsv(rows), 'utf-8');
    written.push(csvPath);
  }
  return written;
}
