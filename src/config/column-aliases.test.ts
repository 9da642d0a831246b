import { loadColumnAliases, parseColumnAliases } from './column-aliases';

describe('column aliases', () => {
  it('should load the bundled alias tables in file order', () => {
    const aliases = loadColumnAliases();

    expect(aliases.single.map(rule => rule.field)).toEqual([
      'SL', 'Barcode', 'REF', 'AddrePincode', 'AddreName', 'AddreCity'
    ]);
    expect(aliases.single[0].aliases).toEqual(['SL', 'sr', 'srno', 'SR. NO.', 'sr. no.']);
    expect(aliases.address).toContain('CUSTOMER_ADDRESS');
  });

  it('should trim aliases and drop blank ones', () => {
    const aliases = parseColumnAliases({
      single: { AddreCity: ['City', '', '  district  '] },
      address: [' ADDRESS ', 'add1']
    });

    expect(aliases.single).toEqual([{ field: 'AddreCity', aliases: ['City', 'district'] }]);
    expect(aliases.address).toEqual(['ADDRESS', 'add1']);
  });

  it('should reject a field that is not part of the output schema', () => {
    expect(() => parseColumnAliases({
      single: { Consignee: ['consignee'] },
      address: ['address']
    })).toThrow('single.Consignee: not a canonical output field');
  });

  it('should reject an empty address alias list', () => {
    expect(() => parseColumnAliases({ single: {}, address: ['  '] }))
      .toThrow('At least one address alias is required');
  });
});
