export interface PriceBar {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume?: number;
}

export interface IndicatorRow extends PriceBar {
	/** Position of the source bar in the input table. */
	index: number;
	fastLine: number;
	slowLine: number;
	spanA: number;
	spanB: number;
	volatility: number;
	trendValue: number;
	longConfirmed: boolean;
	shortConfirmed: boolean;
}

export type TradeSignal = "LONG" | "SHORT" | "NONE";
export type TrendBias = 1 | 0 | -1;

export interface SignalRow extends IndicatorRow {
	cloudTop: number;
	cloudBottom: number;
	trendBias: TrendBias;
	aboveCloudCount: number;
	belowCloudCount: number;
	pierceUp: boolean;
	pierceDown: boolean;
	signal: TradeSignal;
}

export type ActivePositionSide = "LONG" | "SHORT";
export type PositionSide = ActivePositionSide | "FLAT";

export type ExitReason = "STOP_LOSS" | "TAKE_PROFIT";

export interface OpenPosition {
	side: ActivePositionSide;
	entryPrice: number;
	size: number;
	stopLossPrice: number;
	takeProfitPrice: number;
	entryTimestamp: number;
	entryIndex: number;
	entryCommission: number;
}

export interface Trade {
	side: ActivePositionSide;
	entryTimestamp: number;
	exitTimestamp: number;
	entryPrice: number;
	exitPrice: number;
	size: number;
	stopLossPrice: number;
	takeProfitPrice: number;
	exitReason: ExitReason;
	commission: number;
	pnl: number;
	returnPct: number;
	barsHeld: number;
}

export interface EquityPoint {
	timestamp: number;
	equity: number;
	cash: number;
	side: PositionSide;
	/** True when a position was open at any moment of the bar. */
	exposed: boolean;
}

export const sideSign = (side: ActivePositionSide): 1 | -1 =>
	side === "LONG" ? 1 : -1;
