/**
 * Valuation Ratio Calculator
 *
 * Turns one fiscal period's statement figures plus its close price and share
 * count into ratios. Total over its inputs: an absent operand or a zero
 * denominator yields `null` for the affected fields only.
 */

import type { FinancialPeriod } from '@/types/market';
import { safeDivide, toFiniteNumber } from '@/utils/numeric';

export interface ValuationRow {
  periodEnd: string;
  closePrice: number | null;
  sharesOutstanding: number | null;
  netIncome: number | null;
  totalDebt: number | null;
  totalEquity: number | null;
  totalRevenue: number | null;
  freeCashFlow: number | null;
  roe: number | null; // %
  debtToEquity: number | null;
  profitMargin: number | null; // %
  pe: number | null;
  pb: number | null;
  ps: number | null;
  pfcf: number | null;
  marketCap: number | null;
}

export interface ValuationInputs {
  closePrice: number | null;
  sharesOutstanding: number | null;
}

function percent(value: number | null): number | null {
  return value === null ? null : value * 100;
}

function sum(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : toFiniteNumber(a + b);
}

function product(a: number | null, b: number | null): number | null {
  return a === null || b === null ? null : toFiniteNumber(a * b);
}

/**
 * price ÷ (amount / shares); `null` when any link in the chain is missing or the
 * per-share value is zero.
 */
export function priceMultiple(
  price: number | null,
  amount: number | null,
  shares: number | null
): number | null {
  if (price === null) return null;
  return safeDivide(price, safeDivide(amount, shares));
}

export function calculateValuationRow(
  period: FinancialPeriod,
  inputs: ValuationInputs
): ValuationRow {
  const netIncome = toFiniteNumber(period.netIncome);
  const totalDebt = toFiniteNumber(period.totalDebt);
  const totalEquity = toFiniteNumber(period.totalEquity);
  const totalRevenue = toFiniteNumber(period.totalRevenue);
  const cashFromOps = toFiniteNumber(period.cashFromOps);
  const capitalExpenditures = toFiniteNumber(period.capitalExpenditures);
  const price = toFiniteNumber(inputs.closePrice);
  const shares = toFiniteNumber(inputs.sharesOutstanding);

  // Capex is reported as a negative outflow.
  const freeCashFlow = sum(cashFromOps, capitalExpenditures);

  return {
    periodEnd: period.periodEnd,
    closePrice: price,
    sharesOutstanding: shares,
    netIncome,
    totalDebt,
    totalEquity,
    totalRevenue,
    freeCashFlow,
    roe: percent(safeDivide(netIncome, totalEquity)),
    debtToEquity: safeDivide(totalDebt, totalEquity),
    profitMargin: percent(safeDivide(netIncome, totalRevenue)),
    pe: priceMultiple(price, netIncome, shares),
    pb: priceMultiple(price, totalEquity, shares),
    ps: priceMultiple(price, totalRevenue, shares),
    pfcf: priceMultiple(price, freeCashFlow, shares),
    marketCap: product(price, shares),
  };
}
