import assert from 'node:assert/strict';
import test from 'node:test';

import { normalize } from '../lib/normalize.js';
import {
  formatEvent,
  formatRatePercent,
  mergeSuggestions,
  suggestFromMaster
} from '../lib/suggestions.js';
import { buildSampleIndex } from './master_fixture.js';

const index = buildSampleIndex();
const BANK_CODES = { 'state bank of india': '0' };

test('suggestFromMaster reports an alias match for a remitter known only by alias', () => {
  const { suggestions, events } = suggestFromMaster(index, { NameRemitter: 'Sundaram Precision' }, BANK_CODES);

  assert.deepEqual(suggestions, {
    NameRemitter: 'Sundaram Precision Tools Pvt Ltd',
    RemitterPAN: 'AAECS1234K',
    NameBankCode: '0',
    BranchName: 'Anna Salai, Chennai',
    BsrCode: '0002345'
  });
  assert.deepEqual(events[0], {
    lookup_domain: 'indian',
    input: 'Sundaram Precision',
    resolved: 'Sundaram Precision Tools Pvt Ltd',
    match_type: 'alias_matched',
    source: 'master.indian_companies'
  });
  assert.notEqual(events[0].resolved, normalize(events[0].input));
  assert.deepEqual(events[1], {
    lookup_domain: 'party',
    input: 'Sundaram Precision Tools Pvt Ltd',
    resolved: 'State Bank of India',
    match_type: 'matched',
    source: 'master.banks_by_party'
  });
  assert.equal(events.length, 2);
  assert.ok(events.every((event) => Object.isFrozen(event)));
});

test('suggestFromMaster withholds remitter suggestions when nothing matches', () => {
  const { suggestions, events } = suggestFromMaster(index, { NameRemitter: 'Unknown Widgets Ltd' }, BANK_CODES);

  assert.deepEqual(suggestions, {});
  assert.deepEqual(
    events.map((event) => [event.lookup_domain, event.match_type, event.resolved]),
    [
      ['indian', 'not_found', ''],
      ['party', 'not_found', '']
    ]
  );
});

test('suggestFromMaster emits no events for empty seeds', () => {
  const result = suggestFromMaster(index, { NameRemitter: '  ', NatureRemCategory: '' }, BANK_CODES);
  assert.deepEqual(result, { suggestions: {}, events: [] });
});

test('suggestFromMaster resolves the bank named in NameBankCode', () => {
  const { suggestions } = suggestFromMaster(
    index,
    { NameRemitter: 'Sundaram Precision Tools Pvt Ltd', NameBankCode: 'HDFC Bank' },
    {}
  );

  assert.equal(suggestions.NameBankCode, 'HDFC Bank Ltd');
  assert.equal(suggestions.BranchName, 'T Nagar, Chennai');
  assert.equal(suggestions.BsrCode, '0510012');
});

test('suggestFromMaster falls back to the first party bank when the named bank is unknown', () => {
  const { suggestions } = suggestFromMaster(
    index,
    { NameRemitter: 'Sundaram Precision Tools Pvt Ltd', NameBankCode: 'Yes Bank' },
    BANK_CODES
  );

  assert.equal(suggestions.NameBankCode, '0');
  assert.equal(suggestions.BsrCode, '0002345');
});

test('suggestFromMaster ignores a named bank registered for another party', () => {
  const { suggestions, events } = suggestFromMaster(
    index,
    { NameRemitter: 'Sundaram Precision Tools Pvt Ltd', NameBankCode: 'ICICI Bank' },
    {}
  );

  assert.equal(suggestions.NameBankCode, 'State Bank of India');
  assert.equal(suggestions.BranchName, 'Anna Salai, Chennai');
  assert.equal(suggestions.BsrCode, '0002345');
  assert.equal(events[1].match_type, 'matched');
});

test('suggestFromMaster suggests no bank for a remitter without registered banks', () => {
  const { suggestions, events } = suggestFromMaster(
    index,
    { NameRemitter: 'Unknown Widgets Ltd', NameBankCode: 'ICICI Bank' },
    {}
  );

  assert.deepEqual(suggestions, {});
  assert.deepEqual(events[1], {
    lookup_domain: 'party',
    input: 'Unknown Widgets Ltd',
    resolved: '',
    match_type: 'not_found',
    source: 'master.banks_by_party'
  });
});

test('suggestFromMaster keeps only the digits of a BSR code', () => {
  const { suggestions, events } = suggestFromMaster(index, { NameRemitter: 'Nilgiri Textiles Ltd' }, {});

  assert.equal(suggestions.BsrCode, '6110032');
  assert.equal(suggestions.NameRemitter, undefined);
  assert.deepEqual(
    events.map((event) => event.match_type),
    ['not_found', 'matched']
  );
});

test('suggestFromMaster fills remittee, nature and treaty fields', () => {
  const { suggestions, events } = suggestFromMaster(
    index,
    { NameRemittee: 'Northwind GmbH', NatureRemCategory: 'SaaS fees', CountryRemMadeSecb: 'USA' },
    {}
  );

  assert.deepEqual(suggestions, {
    NameRemittee: 'Northwind Software GmbH',
    NatureRemCategory: 'Software licence fees',
    RevPurCategory: 'Computer services',
    RevPurCode: 'RB-12.1-S0803',
    RelevantDtaa: 'United States of America',
    RelevantArtDtaa: 'Article 12',
    RateTdsADtaa: '15'
  });
  assert.deepEqual(
    events.map((event) => `${event.lookup_domain}:${event.match_type}`),
    ['foreign:alias_matched', 'nature:alias_matched', 'country:alias_matched']
  );
});

test('suggestFromMaster seeds the treaty lookup from the remittee city when no country is given', () => {
  const { suggestions, events } = suggestFromMaster(index, { RemitteeTownCityDistrict: 'Germany' }, {});

  assert.equal(suggestions.RateTdsADtaa, '10');
  assert.deepEqual(events, [
    {
      lookup_domain: 'country',
      input: 'Germany',
      resolved: 'Germany',
      match_type: 'matched',
      source: 'master.dtaa_rates'
    }
  ]);
});

test('suggestFromMaster leaves its input untouched', () => {
  const extracted = Object.freeze({ NameRemitter: 'Sundaram Precision', RemitterPAN: 'wrong' });
  const { suggestions } = suggestFromMaster(index, extracted, BANK_CODES);

  assert.deepEqual(extracted, { NameRemitter: 'Sundaram Precision', RemitterPAN: 'wrong' });
  assert.equal(suggestions.RemitterPAN, 'AAECS1234K');
});

test('formatRatePercent converts fractions to percentage text', () => {
  assert.equal(formatRatePercent(0.1), '10');
  assert.equal(formatRatePercent(0.125), '12.5');
  assert.equal(formatRatePercent(0.2), '20');
  assert.equal(formatRatePercent(null), null);
});

test('formatEvent renders matches and misses', () => {
  const { events } = suggestFromMaster(index, { NameRemitter: 'Sundaram Precision' }, BANK_CODES);
  assert.equal(
    formatEvent(events[0]),
    "[indian] alias_matched: 'Sundaram Precision' -> Sundaram Precision Tools Pvt Ltd (master.indian_companies)"
  );

  const missed = suggestFromMaster(index, { NameRemitter: 'Unknown Widgets Ltd' }, BANK_CODES).events[0];
  assert.equal(formatEvent(missed), "[indian] not_found: 'Unknown Widgets Ltd' -> no match (master.indian_companies)");
});

test('mergeSuggestions returns a new dictionary with suggestions applied', () => {
  const fields = { NameRemitter: 'Sundaram Precision', AmtPayForgnRem: '1200' };
  const merged = mergeSuggestions(fields, { NameRemitter: 'Sundaram Precision Tools Pvt Ltd' });

  assert.deepEqual(merged, { NameRemitter: 'Sundaram Precision Tools Pvt Ltd', AmtPayForgnRem: '1200' });
  assert.equal(fields.NameRemitter, 'Sundaram Precision');
});
