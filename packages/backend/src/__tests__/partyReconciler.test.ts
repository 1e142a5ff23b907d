import { reconcileParty } from '../services/partyReconciler.service';

describe('reconcileParty', () => {
  it('should prefer the invoice name and phone', () => {
    const party = reconcileParty(
      { name: 'Harbor Textiles Co', address: '88 Dock Road', phone: '555-0100' },
      { name: 'Harbor Textiles Company Ltd', address: null, phone: '555-0199' }
    );

    expect(party).toEqual({
      name: 'Harbor Textiles Company Ltd',
      address: '88 Dock Road',
      phone: '555-0199',
    });
  });

  it('should fall back to the bill of lading when the invoice lacks a value', () => {
    const party = reconcileParty(
      { name: 'Harbor Textiles Co', phone: '555-0100' },
      { name: 'not detected', phone: '   ' }
    );

    expect(party.name).toBe('Harbor Textiles Co');
    expect(party.phone).toBe('555-0100');
  });

  it('should take the longer address', () => {
    const party = reconcileParty(
      { address: '88 Dock Road' },
      { address: '88 Dock Road, Pudong, Shanghai 200120' }
    );
    expect(party.address).toBe('88 Dock Road, Pudong, Shanghai 200120');
  });

  it('should keep the bill of lading address on a tie', () => {
    const party = reconcileParty({ address: '12 North St' }, { address: '12 South St' });
    expect(party.address).toBe('12 North St');
  });

  it('should use the sentinel for everything missing', () => {
    expect(reconcileParty(null, undefined)).toEqual({
      name: 'not detected',
      address: 'not detected',
      phone: 'not detected',
    });
  });
});
