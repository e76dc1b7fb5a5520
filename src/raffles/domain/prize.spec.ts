import { PrizeType, awardPrize, createPrize, createPrizePool, remainingQuantity, totalPrizeValue } from './prize';

describe('Prize', () => {
  it('should order a prize pool by tier and keep input order within a tier', () => {
    const result = createPrizePool([
      { id: 'b', name: 'Car wash', tier: 2, type: PrizeType.DISCOUNT, value: 20, quantityAvailable: 5 },
      { id: 'a', name: 'Fuel card', tier: 1, type: PrizeType.FUEL_CREDIT, value: 300, quantityAvailable: 1 },
      { id: 'c', name: 'Coffee', tier: 2, type: PrizeType.GIFT_CARD, value: 5, quantityAvailable: 10 },
    ]);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.map((p) => p.id)).toEqual(['a', 'b', 'c']);
      expect(totalPrizeValue(result.value)).toBe(300 + 100 + 50);
    }
  });

  it('should report every invalid field with the prize index', () => {
    const result = createPrizePool([
      { name: ' ', tier: 0, type: PrizeType.CASH, value: -1, quantityAvailable: 0 },
    ]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues).toEqual([
        'prizes[0]: Prize name is required',
        'prizes[0]: Prize tier must be a positive integer',
        'prizes[0]: Prize value must be non-negative',
        'prizes[0]: Prize quantity must be a positive integer',
      ]);
    }
  });

  it('should reject duplicate prize ids', () => {
    const prize = { id: 'same', name: 'Cash', tier: 1, type: PrizeType.CASH, value: 10, quantityAvailable: 1 };
    const result = createPrizePool([prize, { ...prize, tier: 2 }]);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.issues).toEqual(['Prize ids must be unique']);
    }
  });

  it('should never award more than the available quantity', () => {
    const created = createPrize({ id: 'p', name: 'Cash', tier: 1, type: PrizeType.CASH, value: 10, quantityAvailable: 2 });
    expect(created.ok).toBe(true);
    if (!created.ok) return;

    const awarded = awardPrize(created.value, 2);
    expect(awarded.quantityAwarded).toBe(2);
    expect(remainingQuantity(awarded)).toBe(0);
    expect(() => awardPrize(awarded, 1)).toThrow('Prize p would be over-awarded (3/2)');
  });
});
