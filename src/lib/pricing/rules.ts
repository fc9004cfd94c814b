/**
 * Pricing and advertising rules
 *
 * Rules are evaluated top to bottom and the first match decides the outcome.
 * Add new rules at the position they should win at; the order is the priority.
 */

import type { RuleInput, RuleOutcome } from './types';

export interface PricingRule {
  name: string;
  matches: (input: RuleInput) => boolean;
  outcome: RuleOutcome;
}

export const PRICING_RULES: readonly PricingRule[] = [
  {
    name: 'high-inventory-low-sales',
    matches: ({ available, unitsOrdered, grossProfitPerUnit }) =>
      available >= 80 && unitsOrdered <= 5 && grossProfitPerUnit > 3,
    outcome: {
      strategy: 'clear_inventory',
      priceAction: 'drop',
      priceChangePct: -0.1,
      adAction: 'boost_low',
      reason: 'High inventory, low recent sales, healthy unit margin',
    },
  },
  {
    name: 'moderate-inventory-low-sales',
    matches: ({ available, unitsOrdered, grossProfitPerUnit }) =>
      available >= 30 && available < 80 && unitsOrdered <= 5 && grossProfitPerUnit > 2,
    outcome: {
      strategy: 'stimulate_demand',
      priceAction: 'drop',
      priceChangePct: -0.05,
      adAction: 'none',
      reason: 'Moderate inventory, low sales; small price drop to test elasticity',
    },
  },
  {
    name: 'low-inventory-strong-margin',
    matches: ({ available, unitsOrdered, grossProfitPerUnit }) =>
      available < 20 && grossProfitPerUnit > 5 && unitsOrdered > 0,
    outcome: {
      strategy: 'premium_position',
      priceAction: 'increase',
      priceChangePct: 0.05,
      adAction: 'none',
      reason: 'Low inventory and strong margin; small price increase justified',
    },
  },
  {
    name: 'hero-sku',
    matches: ({ available, unitsOrdered, grossProfitPerUnit }) =>
      available >= 40 && available <= 100 && unitsOrdered >= 10 && grossProfitPerUnit > 2,
    outcome: {
      strategy: 'hold',
      priceAction: 'none',
      priceChangePct: 0,
      adAction: 'boost_low',
      reason: 'Balanced inventory and demand; consider slight ad boost to scale hero SKU',
    },
  },
];

export const DEFAULT_OUTCOME: RuleOutcome = {
  strategy: 'hold',
  priceAction: 'none',
  priceChangePct: 0,
  adAction: 'none',
  reason: 'Default hold – no strong inventory or margin signal',
};

export function evaluateRules(
  input: RuleInput,
  rules: readonly PricingRule[] = PRICING_RULES
): RuleOutcome {
  const rule = rules.find((candidate) => candidate.matches(input));
  return rule ? rule.outcome : DEFAULT_OUTCOME;
}
