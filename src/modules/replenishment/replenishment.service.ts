import type { Product } from '../../connections/db/models/product.model';
import type { PantrySnapshot } from '../../connections/db/models/pantry-snapshot.model';
import { estimateMonthlyRate } from '../consumption/consumption.service';
import { roundMoney } from '../../utils/money';

export const BELOW_MINIMUM_REASON = 'below minimum stock';

export type SuggestionBasis = 'consumption' | 'minimum_stock' | 'none';

export interface Suggestion {
  suggested_qty: number;
  reason: string;
  basis: SuggestionBasis;
}

export interface ShoppingListItem {
  product_id: number;
  name: string;
  brand: string | null;
  suggested_qty: number;
  reason: string;
  basis: Exclude<SuggestionBasis, 'none'>;
  monthly_rate: number | null;
  unit_price: number;
  cost: number;
}

export interface ShoppingList {
  items: ShoppingListItem[];
  forecast_total: number;
}

const NO_SUGGESTION: Suggestion = { suggested_qty: 0, reason: '', basis: 'none' };

/**
 * Rounds a positive need up: add 0.9, truncate toward zero. 3.0 stays 3,
 * 3.01 gives 3, 3.2 gives 4 and anything under 0.1 gives 0.
 */
export const roundUpNeed = (need: number): number => Math.max(Math.trunc(need + 0.9), 0);

export const consumptionReason = (monthlyRate: number): string =>
  `consumption-based, rate=${monthlyRate.toFixed(1)}/month`;

const suggest = (need: number, reason: string, basis: Suggestion['basis']): Suggestion => {
  const qty = roundUpNeed(need);
  return qty > 0 ? { suggested_qty: qty, reason, basis } : NO_SUGGESTION;
};

/**
 * Suggested purchase for one product. The consumption rate drives the
 * suggestion when it yields a positive need; otherwise the minimum stock
 * floor does.
 */
export const planReplenishment = (product: Product, monthlyRate: number | null): Suggestion => {
  if (monthlyRate !== null) {
    const need = monthlyRate - product.current_stock;
    if (need > 0) {
      return suggest(need, consumptionReason(monthlyRate), 'consumption');
    }
  }

  const need = product.min_stock - product.current_stock;
  if (need > 0) {
    return suggest(need, BELOW_MINIMUM_REASON, 'minimum_stock');
  }

  return NO_SUGGESTION;
};

/**
 * Products with a positive suggestion, in store order, priced at their last
 * unit price.
 */
export const buildShoppingList = (snapshot: PantrySnapshot): ShoppingList => {
  const items: ShoppingListItem[] = [];

  for (const product of snapshot.products) {
    const monthlyRate = estimateMonthlyRate(product.id, snapshot.history);
    const suggestion = planReplenishment(product, monthlyRate);
    if (suggestion.basis === 'none') {
      continue;
    }

    items.push({
      product_id: product.id,
      name: product.name,
      brand: product.brand,
      suggested_qty: suggestion.suggested_qty,
      reason: suggestion.reason,
      basis: suggestion.basis,
      monthly_rate: monthlyRate,
      unit_price: product.unit_price,
      cost: roundMoney(suggestion.suggested_qty * product.unit_price),
    });
  }

  return {
    items,
    forecast_total: roundMoney(items.reduce((sum, item) => sum + item.cost, 0)),
  };
};
