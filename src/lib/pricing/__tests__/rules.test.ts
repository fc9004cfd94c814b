import { DEFAULT_OUTCOME, evaluateRules, PRICING_RULES, type PricingRule } from '../rules';

describe('evaluateRules', () => {
  it('should clear inventory when stock is high, sales are low and margin is healthy', () => {
    const outcome = evaluateRules({ available: 90, unitsOrdered: 2, grossProfitPerUnit: 167.5 });

    expect(outcome).toEqual({
      strategy: 'clear_inventory',
      priceAction: 'drop',
      priceChangePct: -0.1,
      adAction: 'boost_low',
      reason: 'High inventory, low recent sales, healthy unit margin',
    });
  });

  it('should stimulate demand for moderate stock with low sales', () => {
    const outcome = evaluateRules({ available: 30, unitsOrdered: 5, grossProfitPerUnit: 2.01 });

    expect(outcome.strategy).toBe('stimulate_demand');
    expect(outcome.priceAction).toBe('drop');
    expect(outcome.priceChangePct).toBe(-0.05);
    expect(outcome.adAction).toBe('none');
  });

  it('should move to a premium position when stock is low and margin is strong', () => {
    const outcome = evaluateRules({ available: 19, unitsOrdered: 1, grossProfitPerUnit: 5.01 });

    expect(outcome).toEqual({
      strategy: 'premium_position',
      priceAction: 'increase',
      priceChangePct: 0.05,
      adAction: 'none',
      reason: 'Low inventory and strong margin; small price increase justified',
    });
  });

  it('should hold with an ad boost for a balanced hero sku', () => {
    const outcome = evaluateRules({ available: 100, unitsOrdered: 10, grossProfitPerUnit: 2.5 });

    expect(outcome.strategy).toBe('hold');
    expect(outcome.priceAction).toBe('none');
    expect(outcome.adAction).toBe('boost_low');
    expect(outcome.reason).toBe(
      'Balanced inventory and demand; consider slight ad boost to scale hero SKU'
    );
  });

  it.each([
    ['margin exactly at the clearance threshold', { available: 80, unitsOrdered: 5, grossProfitPerUnit: 3 }],
    ['stock just under the moderate band', { available: 29, unitsOrdered: 5, grossProfitPerUnit: 10 }],
    ['low stock without sales', { available: 10, unitsOrdered: 0, grossProfitPerUnit: 50 }],
    ['low stock with margin at the premium threshold', { available: 10, unitsOrdered: 3, grossProfitPerUnit: 5 }],
    ['fast seller above the hero stock band', { available: 101, unitsOrdered: 10, grossProfitPerUnit: 10 }],
    ['moderate stock, no sales, thin margin', { available: 50, unitsOrdered: 0, grossProfitPerUnit: 1.34 }],
  ])('should fall back to the default hold for %s', (_label, input) => {
    expect(evaluateRules(input)).toBe(DEFAULT_OUTCOME);
  });

  it('should return the default outcome values', () => {
    expect(DEFAULT_OUTCOME).toEqual({
      strategy: 'hold',
      priceAction: 'none',
      priceChangePct: 0,
      adAction: 'none',
      reason: 'Default hold – no strong inventory or margin signal',
    });
  });

  it('should let the first matching rule win', () => {
    const first: PricingRule = {
      name: 'first',
      matches: () => true,
      outcome: { ...DEFAULT_OUTCOME, reason: 'first' },
    };
    const second: PricingRule = {
      name: 'second',
      matches: () => true,
      outcome: { ...DEFAULT_OUTCOME, reason: 'second' },
    };

    const input = { available: 90, unitsOrdered: 2, grossProfitPerUnit: 10 };

    expect(evaluateRules(input, [first, second]).reason).toBe('first');
    expect(evaluateRules(input, [second, first]).reason).toBe('second');
  });

  it('should evaluate clearance before every other rule', () => {
    expect(PRICING_RULES.map((rule) => rule.outcome.strategy)).toEqual([
      'clear_inventory',
      'stimulate_demand',
      'premium_position',
      'hold',
    ]);
  });
});
