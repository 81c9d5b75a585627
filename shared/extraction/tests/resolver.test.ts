import assert from 'node:assert/strict';

import { EntityRecognizerAdapter } from '../entities.js';
import { widenWordClasses } from '../patterns.js';
import { PatternEntityRecognizer } from '../recognizers/patternRecognizer.js';
import { cleanExtractedValue, FieldResolver } from '../resolver.js';
import type { EntityRecognizer, FieldRule } from '../types.js';

function rule(overrides: Partial<FieldRule> & { name: string }): FieldRule {
  return { pattern: [], regexPatterns: [], ...overrides };
}

const INVOICE_TEXT = '发票\n金额：￥1,250.00\n开票日期：2024年3月5日\n';

function testRegexStrategy(): void {
  const resolver = new FieldResolver(null);
  const field = resolver.resolve(
    rule({
      name: 'Invoice Amount',
      pattern: ['金额'],
      regexPatterns: ['金额[:：]\\s*[￥$]?([\\d,\\.]+)'],
      postProcess: 'amount_normalize',
    }),
    INVOICE_TEXT
  );
  assert.deepEqual(field, { name: 'Invoice Amount', value: '1250.00', confidence: 90, boundingBox: null });
}

function testKeywordStrategy(): void {
  const resolver = new FieldResolver(null);
  const total = resolver.resolve(
    rule({ name: 'Total', pattern: ['Total'], valueTypeHint: 'amount' }),
    'Total: USD 500 due'
  );
  assert.equal(total.value, '500');
  assert.equal(total.confidence, 85);

  const date = resolver.resolve(
    rule({ name: 'Invoice Date', pattern: ['日期'], valueTypeHint: 'date', postProcess: 'date_normalize' }),
    INVOICE_TEXT
  );
  assert.equal(date.value, '2024-03-05');
  assert.equal(date.confidence, 85);
}

function testRegexBeatsKeyword(): void {
  const resolver = new FieldResolver(null);
  const field = resolver.resolve(
    rule({ name: 'Reference', pattern: ['Ref'], regexPatterns: ['Ref[:：]\\s*([A-Z0-9-]+)'] }),
    'Ref: AB-778 (copy)'
  );
  assert.equal(field.value, 'AB-778');
  assert.equal(field.confidence, 90);
}

function testEmptyCaptureFallsThrough(): void {
  const resolver = new FieldResolver(null);
  const field = resolver.resolve(
    rule({ name: 'Total', pattern: ['Total'], regexPatterns: ['Memo:([ ]*)'] }),
    'Memo: \nTotal: 42'
  );
  assert.equal(field.value, '42');
  assert.equal(field.confidence, 85);
}

function testMalformedRegexIsSkipped(): void {
  const resolver = new FieldResolver(null);
  const field = resolver.resolve(rule({ name: 'Broken', regexPatterns: ['([unclosed'] }), 'anything at all');
  assert.deepEqual(field, { name: 'Broken', value: null, confidence: 0, boundingBox: null });
}

function testEntityFallback(): void {
  const backend: EntityRecognizer = {
    name: 'fake',
    findEntities: () => [{ text: ' Acme Corp ', label: 'ORG' }],
  };
  const resolver = new FieldResolver(new EntityRecognizerAdapter(backend));
  const field = resolver.resolve(rule({ name: 'Vendor', pattern: ['Supplier'], entityType: 'ORG' }), 'Billed by Acme Corp');
  assert.equal(field.value, 'Acme Corp');
  assert.equal(field.confidence, 80);

  const withoutRecognizer = new FieldResolver(null).resolve(
    rule({ name: 'Vendor', entityType: 'ORG' }),
    'Billed by Acme Corp'
  );
  assert.equal(withoutRecognizer.value, null);
}

function testWordClassesCoverCjk(): void {
  const resolver = new FieldResolver(null);
  const company = resolver.resolve(
    rule({ name: 'Vendor/Company', regexPatterns: ['([\\w\\s]+)(?:公司|Inc|Corp)'] }),
    '上海示例科技公司 开具'
  );
  assert.equal(company.value, '上海示例科技');
  assert.equal(company.confidence, 90);

  const number = resolver.resolve(rule({ name: 'Invoice Number', regexPatterns: ['发票号码[:：]\\s*(\\w+)'] }), '发票号码：沪A12345');
  assert.equal(number.value, '沪A12345');

  const bounded = resolver.resolve(rule({ name: 'City', regexPatterns: ['\\b(上海)\\b'] }), '地址 上海 浦东');
  assert.equal(bounded.value, '上海');
  assert.equal(resolver.resolve(rule({ name: 'City', regexPatterns: ['\\b(上海)\\b'] }), '地址上海浦东').value, null);
}

function testPatternsRejectedInUnicodeModeStillRun(): void {
  const resolver = new FieldResolver(null);
  const field = resolver.resolve(rule({ name: 'Order', regexPatterns: ['No\\-(\\d+)'] }), 'Order No-42');
  assert.equal(field.value, '42');
  assert.equal(field.confidence, 90);
}

function testWidening(): void {
  assert.equal(widenWordClasses('\\w+'), '[\\p{L}\\p{N}_]+');
  assert.equal(widenWordClasses('[\\w\\-]+'), '[\\p{L}\\p{N}_\\-]+');
  assert.equal(widenWordClasses('\\W'), '[^\\p{L}\\p{N}_]');
  assert.equal(widenWordClasses('\\\\w'), '\\\\w');
  assert.equal(widenWordClasses('[\\]\\w]'), '[\\]\\p{L}\\p{N}_]');
}

function testRegexWinsWhenEveryStrategyMatches(): void {
  const resolver = new FieldResolver(new EntityRecognizerAdapter(new PatternEntityRecognizer()));
  const field = resolver.resolve(
    rule({
      name: 'Amount',
      pattern: ['Total'],
      regexPatterns: ['Total:\\s*\\$([\\d.]+)'],
      entityType: 'MONEY',
      valueTypeHint: 'amount',
    }),
    'Total: $42.50'
  );
  assert.deepEqual(field, { name: 'Amount', value: '42.50', confidence: 90, boundingBox: null });
}

function testRuleWithNoStrategies(): void {
  const resolver = new FieldResolver(new EntityRecognizerAdapter(new PatternEntityRecognizer()));
  for (const text of ['', 'Total: $42.50 paid to Acme Corp on 2024-03-15', '金额：￥1,250.00']) {
    assert.deepEqual(resolver.resolve(rule({ name: 'Blank' }), text), {
      name: 'Blank',
      value: null,
      confidence: 0,
      boundingBox: null,
    });
  }
}

function testNegativeAmountInWindow(): void {
  const resolver = new FieldResolver(null);
  const field = resolver.resolve(
    rule({ name: 'Balance', pattern: ['Balance'], valueTypeHint: 'amount', postProcess: 'amount_normalize' }),
    'Balance: -500'
  );
  assert.equal(field.value, '-500.00');
  assert.equal(field.confidence, 85);
}

function testCleaning(): void {
  assert.equal(cleanExtractedValue('Acme Widgets, Shanghai'), 'Acme Widgets');
  assert.equal(cleanExtractedValue('1,250.00。'), '1,250.00');
  assert.equal(cleanExtractedValue('INV-001; paid'), 'INV-001; paid');
  assert.equal(cleanExtractedValue('   '), '');
}

function run(): void {
  testRegexStrategy();
  testKeywordStrategy();
  testRegexBeatsKeyword();
  testEmptyCaptureFallsThrough();
  testMalformedRegexIsSkipped();
  testEntityFallback();
  testWordClassesCoverCjk();
  testPatternsRejectedInUnicodeModeStillRun();
  testWidening();
  testRegexWinsWhenEveryStrategyMatches();
  testRuleWithNoStrategies();
  testNegativeAmountInWindow();
  testCleaning();
  console.log('All resolver tests passed');
}

run();
