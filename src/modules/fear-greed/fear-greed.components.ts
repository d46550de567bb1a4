import type { ComponentInfo } from './fear-greed.types.js';

/**
 * Sub-indicators of the composite index, in display order.
 * Keys match the top-level fields of the graphdata payload.
 */
export const COMPONENTS: readonly ComponentInfo[] = [
  { key: 'market_momentum_sp500', title: 'Market Momentum (S&P 500)', color: '#1f77b4' },
  { key: 'stock_price_strength', title: 'Stock Price Strength', color: '#2ca02c' },
  { key: 'stock_price_breadth', title: 'Stock Price Breadth', color: '#d62728' },
  { key: 'put_call_options', title: 'Put/Call Options', color: '#9467bd' },
  { key: 'market_volatility_vix', title: 'Market Volatility (VIX)', color: '#8c564b' },
  { key: 'junk_bond_demand', title: 'Junk Bond Demand', color: '#7f7f7f' },
  { key: 'safe_haven_demand', title: 'Safe Haven Demand', color: '#bcbd22' },
];
