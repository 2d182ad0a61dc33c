import { describe, expect, it } from 'vitest';
import {
  buildPartitionFilter,
  formatPartitionDescriptor,
  parsePartitionDescriptor,
} from '../src/metadata/partition-filter.js';

describe('buildPartitionFilter', () => {
  it('ANDs each key/value pair in front of the base filter', () => {
    expect(buildPartitionFilter('year=2025/month=01', 'active=1')).toBe(
      "year='2025' AND month='01' AND active=1"
    );
  });

  it('returns the base filter for tables without partitions', () => {
    expect(buildPartitionFilter('NO_PARTITION', '1=1')).toBe('1=1');
    expect(buildPartitionFilter('', 'region=1')).toBe('region=1');
  });

  it('skips segments without a key/value pair', () => {
    expect(buildPartitionFilter('year=2025/garbage', '1=1')).toBe("year='2025' AND 1=1");
    expect(buildPartitionFilter('garbage', '1=1')).toBe('1=1');
  });

  it('doubles single quotes in values', () => {
    expect(buildPartitionFilter("owner=O'Brien", '1=1')).toBe("owner='O''Brien' AND 1=1");
  });

  it('keeps everything after the first equals sign as the value', () => {
    expect(buildPartitionFilter('expr=a=b', '1=1')).toBe("expr='a=b' AND 1=1");
  });

  it('filters the null sentinel with IS NULL', () => {
    expect(buildPartitionFilter('year=2025/month=__NULL__', '1=1')).toBe(
      "year='2025' AND month IS NULL AND 1=1"
    );
  });

  it('rejects keys that are not plain identifiers', () => {
    let caught: unknown;
    try {
      buildPartitionFilter('year;drop=1', '1=1');
    } catch (err) {
      caught = err;
    }
    expect(caught).toMatchObject({ code: 'INVALID_PARTITION' });
  });
});

describe('partition descriptors', () => {
  it('parses and formats in key order', () => {
    const segments = parsePartitionDescriptor('year=2025/month=01');
    expect(segments).toEqual([
      { key: 'year', value: '2025' },
      { key: 'month', value: '01' },
    ]);
    expect(formatPartitionDescriptor(segments)).toBe('year=2025/month=01');
  });
});

describe('partition key casing', () => {
  it('quotes keys that would fold to lower case', () => {
    expect(buildPartitionFilter('Year=2025', '1=1')).toBe(`"Year"='2025' AND 1=1`);
    expect(buildPartitionFilter('Year=__NULL__', '1=1')).toBe(`"Year" IS NULL AND 1=1`);
  });

  it('leaves lower-case keys bare', () => {
    expect(buildPartitionFilter('year=2025/month=01', 'active=1')).toBe(
      "year='2025' AND month='01' AND active=1"
    );
  });
});

describe('descriptor value escaping', () => {
  it('escapes delimiters when formatting and restores them when parsing', () => {
    const descriptor = formatPartitionDescriptor([{ key: 'region', value: 'EU/West' }]);
    expect(descriptor).toBe('region=EU%2FWest');
    expect(parsePartitionDescriptor(descriptor)).toEqual([{ key: 'region', value: 'EU/West' }]);
  });

  it('escapes percent and equals signs', () => {
    const descriptor = formatPartitionDescriptor([{ key: 'code', value: 'a%b=c' }]);
    expect(descriptor).toBe('code=a%25b%3Dc');
    expect(parsePartitionDescriptor(descriptor)).toEqual([{ key: 'code', value: 'a%b=c' }]);
  });

  it('filters on the decoded value', () => {
    expect(buildPartitionFilter('region=EU%2FWest/year=2025', '1=1')).toBe(
      "region='EU/West' AND year='2025' AND 1=1"
    );
  });
});
