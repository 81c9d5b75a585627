import assert from 'node:assert/strict';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { buildValidationRows, saveResults, toStructuredJson, toValidationCsv } from '../results.js';
import type { StructuredOutput } from '../types.js';

function output(filename: string, fields: StructuredOutput['extractedFields']): StructuredOutput {
  return {
    filename,
    rawText: `text of ${filename}`,
    extractedFields: fields,
    lowConfidenceFields: [],
    overallConfidence: 90,
    validation: null,
  };
}

const MIXED = output('doc.pdf', [
  { name: 'A', value: 'x', confidence: 90, boundingBox: null },
  { name: 'B', value: null, confidence: 0, boundingBox: null },
  { name: 'C', value: 'y', confidence: 70, boundingBox: null },
]);

const CLEAN = output('scan-01.png', [{ name: 'Total', value: '12.00', confidence: 90, boundingBox: null }]);

function testValidationRows(): void {
  assert.deepEqual(buildValidationRows([MIXED, CLEAN]), [
    { filename: 'doc.pdf', field_name: 'B', extracted_value: '', confidence: 0 },
    { filename: 'doc.pdf', field_name: 'C', extracted_value: 'y', confidence: 70 },
  ]);
  assert.equal(buildValidationRows([MIXED], 50).length, 1);
}

async function testCsv(): Promise<void> {
  const csv = await toValidationCsv(buildValidationRows([MIXED]));
  assert.equal(csv, 'filename,field_name,extracted_value,confidence\ndoc.pdf,B,,0\ndoc.pdf,C,y,70');
}

async function testSaveResults(): Promise<void> {
  const dir = await mkdtemp(join(tmpdir(), 'parse-results-'));
  try {
    const written = await saveResults([MIXED, CLEAN], dir);
    assert.deepEqual(written, [
      join(dir, 'doc_raw.txt'),
      join(dir, 'doc_structured.json'),
      join(dir, 'scan-01_raw.txt'),
      join(dir, 'scan-01_structured.json'),
      join(dir, 'validation_list.csv'),
    ]);
    assert.equal(await readFile(join(dir, 'scan-01_raw.txt'), 'utf-8'), 'text of scan-01.png');
    assert.deepEqual(JSON.parse(await readFile(join(dir, 'doc_structured.json'), 'utf-8')), MIXED);
    assert.equal(await readFile(join(dir, 'doc_structured.json'), 'utf-8'), toStructuredJson(MIXED));

    const onlyJson = await saveResults([CLEAN], join(dir, 'clean'), { saveRawText: false });
    assert.deepEqual(onlyJson, [join(dir, 'clean', 'scan-01_structured.json')]);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

void (async function run() {
  testValidationRows();
  await testCsv();
  await testSaveResults();
  console.log('All results tests passed');
})();
