// Raw rows as exported by the broker, before normalization.
// Numeric fields may arrive as numbers or as CSV strings.

export interface BrokerTradeRow {
  dealId?: string;            // broker deal id, used for de-duplication
  code: string;               // US.AAPL, HK.00700, US.AAPL240419C200000
  side: string;               // BUY, SELL, OrderSide.SELL, 买入, 卖出, SELL_SHORT, BUY_BACK
  qty: number | string;
  price: number | string;     // per share, also for option contracts
  fees?: number | string;
  currency?: string;          // derived from the market prefix when absent
  feeCurrency?: string;
  securityType?: string;      // STOCK, ETF, OPTION, WARRANT, ...
  createTime: string;         // YYYY-MM-DD HH:mm:ss[.fff]
}

export interface BrokerCashFlowRow {
  cashflowId?: string;
  code?: string;
  currency: string;
  amount: number | string;
  description: string;
  dealTime: string;
}

export interface StockSplitRow {
  date: string;               // YYYY-MM-DD, effective before that day's trades
  code: string;
  ratio: string;              // "2:1" forward, "1:2" reverse
}

export interface BrokerHistory {
  accountId: string;
  trades: BrokerTradeRow[];
  cashFlows?: BrokerCashFlowRow[];
  splits?: StockSplitRow[];
}
