import assert from 'node:assert/strict';

import { applyPostProcess, normalizeAmount, normalizeDate } from '../normalize.js';

function testAmountSeparators(): void {
  assert.equal(normalizeAmount('1,234.56'), '1234.56');
  assert.equal(normalizeAmount('1.234,56'), '1234.56');
  assert.equal(normalizeAmount('12,50'), '12.50');
  assert.equal(normalizeAmount('1,250'), '1250.00');
  assert.equal(normalizeAmount('¥ 500'), '500.00');
  assert.equal(normalizeAmount('$-7.5'), '-7.50');
  assert.equal(normalizeAmount('￥1.234,56'), '1234.56');
}

function testAmountPassthrough(): void {
  assert.equal(normalizeAmount('abc'), 'abc');
  assert.equal(normalizeAmount(' 12 34x '), '1234x');
}

function testDates(): void {
  assert.equal(normalizeDate('2024年3月5日'), '2024-03-05');
  assert.equal(normalizeDate('2024-3-5'), '2024-03-05');
  assert.equal(normalizeDate('3/15/2024'), '2024-03-15');
  assert.equal(normalizeDate('2024/1/9'), '2024-01-09');
  assert.equal(normalizeDate('3/5/2024'), '2024-03-05');
  assert.equal(normalizeDate('  March 5  '), 'March 5');
  assert.equal(normalizeDate('not a date'), 'not a date');
}

function testNormalisedValuesAreFixedPoints(): void {
  for (const raw of ['1,234.56', '￥1.234,56', '12,50', '1,250', '¥ 500', '$-7.5', '1234.56', 'abc', ' 12 34x ']) {
    const once = normalizeAmount(raw);
    assert.equal(normalizeAmount(once), once, `amount ${raw}`);
  }
  for (const raw of ['2024年3月5日', '2024-3-5', '3/15/2024', '2024/1/9', '2024-03-05', 'not a date']) {
    const once = normalizeDate(raw);
    assert.equal(normalizeDate(once), once, `date ${raw}`);
  }
}

function testPostProcessLookup(): void {
  assert.equal(applyPostProcess('amount_normalize', '¥1,000'), '1000.00');
  assert.equal(applyPostProcess('amount-normalize', '¥1,000'), '1000.00');
  assert.equal(applyPostProcess('DATE_NORMALIZE', '2024年12月1日'), '2024-12-01');
  assert.equal(applyPostProcess('uppercase', 'abc'), 'abc');
  assert.equal(applyPostProcess('constructor', 'abc'), 'abc');
  assert.equal(applyPostProcess(undefined, 'abc'), 'abc');
}

function run(): void {
  testAmountSeparators();
  testAmountPassthrough();
  testDates();
  testNormalisedValuesAreFixedPoints();
  testPostProcessLookup();
  console.log('All normalize tests passed');
}

run();
