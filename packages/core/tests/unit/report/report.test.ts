import { describe, expect, it } from 'vitest';
import { cruftEntry } from '../../../src/analysis/cruft.js';
import { CRUFTINESS_SECTION, Report, createResult } from '../../../src/report/report.js';
import { ContractError } from '../../../src/utils/errors.js';

function result(heading: string, ids: number[] = []) {
  return createResult(
    heading,
    ids.map(id => ({ id, name: `obj-${id}` })),
    { description: heading, includeInNonVerbose: true, removable: false },
  );
}

describe('Report', () => {
  it('starts empty', () => {
    const report = new Report('packages', 'package', 'Package Report');
    expect(report.isEmpty).toBe(true);
    expect(report.results).toEqual([]);
    expect(report.metadata.size).toBe(0);
  });

  it('keeps results in insertion order and finds them by heading', () => {
    const report = new Report('packages', 'package', 'Package Report');
    report.addResult(result('All Packages')).addResult(result('Unused Packages', [2]));

    expect(report.results.map(r => r.heading)).toEqual(['All Packages', 'Unused Packages']);
    expect(report.getResultByHeading('Unused Packages')?.objects).toEqual([{ id: 2, name: 'obj-2' }]);
    expect(report.getResultByHeading('Missing')).toBeUndefined();
    expect(report.isEmpty).toBe(false);
  });

  it('rejects a second result with the same heading', () => {
    const report = new Report('packages', 'package', 'Package Report');
    report.addResult(result('Unused Packages'));
    expect(() => report.addResult(result('Unused Packages'))).toThrow(ContractError);
  });

  it('replaces a result in place', () => {
    const report = new Report('packages', 'package', 'Package Report');
    report.addResult(result('A')).addResult(result('B', [1])).addResult(result('C'));
    report.replaceResult('B', result('B', [1, 2]));

    expect(report.results.map(r => r.heading)).toEqual(['A', 'B', 'C']);
    expect(report.getResultByHeading('B')?.objects.map(o => o.id)).toEqual([1, 2]);
    expect(() => report.replaceResult('D', result('D'))).toThrow(ContractError);
  });

  it('overwrites a metadata label without moving it', () => {
    const report = new Report('packages', 'package', 'Package Report');
    report
      .setMetadata(CRUFTINESS_SECTION, 'Unused Packages', cruftEntry(2, 3))
      .setMetadata(CRUFTINESS_SECTION, 'Other', cruftEntry(0, 3))
      .setMetadata(CRUFTINESS_SECTION, 'Unused Packages', cruftEntry(1, 3));

    const section = report.metadata.get(CRUFTINESS_SECTION);
    expect([...(section?.keys() ?? [])]).toEqual(['Unused Packages', 'Other']);
    expect(report.getMetadata(CRUFTINESS_SECTION, 'Unused Packages')).toEqual(cruftEntry(1, 3));
  });
});

describe('createResult', () => {
  it('orders objects by id', () => {
    const r = createResult('X', [{ id: 3, name: 'c' }, { id: 1, name: 'a' }], {
      description: '',
      includeInNonVerbose: false,
      removable: true,
    });
    expect(r.objects.map(o => o.id)).toEqual([1, 3]);
    expect(r.removable).toBe(true);
  });
});
