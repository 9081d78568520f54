import assert from 'node:assert/strict';
import test from 'node:test';

import { parseMasterDataset } from '../lib/master_data.js';
import { buildNatureLookups } from '../lib/nature_lookup.js';

test('buildNatureLookups keys purpose codes by lower-cased agreement nature', () => {
  const dataset = parseMasterDataset(
    {
      nature_map: [
        {
          invoice_nature: 'Software subscription',
          agreement_nature: 'Software Licence Fees',
          service_category: 'Computer services',
          purpose_code: 'RB-12.1-S0803'
        },
        {
          invoice_nature: 'Cloud hosting',
          agreement_nature: 'software licence fees',
          service_category: 'Computer services',
          purpose_code: 'RB-12.1-S0802'
        },
        {
          invoice_nature: 'Freight',
          agreement_nature: 'Ocean freight',
          service_category: 'Transportation',
          purpose_code: ''
        },
        {
          invoice_nature: 'Unmapped',
          agreement_nature: '',
          service_category: 'Other',
          purpose_code: 'RB-99.9'
        }
      ]
    },
    'master_data.json'
  );

  const { compact, full } = buildNatureLookups(dataset);

  assert.deepEqual(compact, { 'software licence fees': 'RB-12.1-S0802' });
  assert.deepEqual(full, {
    'software licence fees': {
      agreement_nature: 'software licence fees',
      service_category: 'Computer services',
      purpose_code: 'RB-12.1-S0802'
    },
    'ocean freight': {
      agreement_nature: 'Ocean freight',
      service_category: 'Transportation',
      purpose_code: ''
    }
  });
});
