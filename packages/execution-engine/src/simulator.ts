import { createLogger, sideSign } from "@senko/core";
import type {
	EquityPoint,
	ExitReason,
	OpenPosition,
	SignalRow,
	Trade,
} from "@senko/core";
import { RiskManager } from "@senko/risk-engine";
import type { EntryRejectionReason, RiskConfig } from "@senko/risk-engine";
import { PaperAccount } from "./paperAccount";
import type { PaperAccountSnapshot } from "./paperAccount";

const simLogger = createLogger("execution-engine:simulator");

export interface SimulatorConfig {
	initialCash: number;
	risk: RiskConfig;
	/** Label attached to log events. */
	symbol?: string;
}

export type SkippedSignalReason =
	| EntryRejectionReason
	| "position_open"
	| "exit_bar"
	| "ruined";

export interface RuinState {
	triggered: boolean;
	timestamp: number | null;
	index: number | null;
	equity: number | null;
}

export interface SimulationResult {
	trades: Trade[];
	equityCurve: EquityPoint[];
	/** Position still open after the last bar, marked to market in the equity curve. */
	openPosition: OpenPosition | null;
	ruin: RuinState;
	skippedSignals: Record<SkippedSignalReason, number>;
	account: PaperAccountSnapshot;
}

interface ExitFill {
	price: number;
	reason: ExitReason;
}

const emptySkips = (): Record<SkippedSignalReason, number> => ({
	invalid_price: 0,
	non_positive_volatility: 0,
	non_positive_equity: 0,
	invalid_size: 0,
	position_open: 0,
	exit_bar: 0,
	ruined: 0,
});

/**
 * Bar-by-bar bracket execution over a signal table. The simulator is FLAT,
 * LONG or SHORT and changes state at most once per bar:
 *
 * - FLAT: a LONG/SHORT signal opens a position at the bar close with stop and
 *   target from the risk manager.
 * - LONG/SHORT: from the bar after entry, the bar's range is tested against
 *   the stop and target. When both are inside the range the stop fills. A bar
 *   that closes a position never opens another.
 *
 * Equity is cash plus the open position marked at the close. Once equity is
 * at or below zero no new positions are opened; the run still completes.
 */
export class TradeSimulator {
	private readonly riskManager: RiskManager;

	constructor(private readonly config: SimulatorConfig) {
		this.riskManager = new RiskManager(config.risk);
	}

	run(rows: readonly SignalRow[]): SimulationResult {
		const account = new PaperAccount(this.config.initialCash);
		const trades: Trade[] = [];
		const equityCurve: EquityPoint[] = [];
		const skippedSignals = emptySkips();
		const ruin: RuinState = {
			triggered: false,
			timestamp: null,
			index: null,
			equity: null,
		};
		let position: OpenPosition | null = null;

		for (const row of rows) {
			let exposed = position !== null;
			let closedThisBar = false;

			if (position) {
				const fill = this.checkExit(position, row);
				if (fill) {
					trades.push(this.closePosition(account, position, row, fill));
					position = null;
					closedThisBar = true;
				}
			}

			if (row.signal !== "NONE") {
				if (position) {
					skippedSignals.position_open += 1;
				} else if (closedThisBar) {
					skippedSignals.exit_bar += 1;
				} else if (ruin.triggered) {
					skippedSignals.ruined += 1;
				} else {
					const plan = this.riskManager.planEntry(
						row.signal,
						row.close,
						row.volatility,
						account.cash
					);
					if (plan.status === "rejected") {
						skippedSignals[plan.reason] += 1;
					} else {
						const entryCommission = this.riskManager.commissionFor(
							plan.plan.entryPrice,
							plan.plan.quantity
						);
						account.chargeCommission(entryCommission);
						position = {
							side: plan.plan.positionSide,
							entryPrice: plan.plan.entryPrice,
							size: plan.plan.quantity,
							stopLossPrice: plan.plan.stopLossPrice,
							takeProfitPrice: plan.plan.takeProfitPrice,
							entryTimestamp: row.timestamp,
							entryIndex: row.index,
							entryCommission,
						};
						exposed = true;
						simLogger.debug("trade_opened", {
							symbol: this.config.symbol,
							...position,
						});
					}
				}
			}

			const snapshot = account.snapshot(
				position ? this.unrealizedPnl(position, row.close) : 0
			);
			equityCurve.push({
				timestamp: row.timestamp,
				equity: snapshot.equity,
				cash: snapshot.balance,
				side: position ? position.side : "FLAT",
				exposed,
			});

			if (!ruin.triggered && snapshot.equity <= 0) {
				ruin.triggered = true;
				ruin.timestamp = row.timestamp;
				ruin.index = row.index;
				ruin.equity = snapshot.equity;
				simLogger.warn("ruin_triggered", {
					symbol: this.config.symbol,
					timestamp: row.timestamp,
					equity: snapshot.equity,
				});
			}
		}

		return {
			trades,
			equityCurve,
			openPosition: position,
			ruin,
			skippedSignals,
			account: account.snapshot(
				position && rows.length
					? this.unrealizedPnl(position, rows[rows.length - 1].close)
					: 0
			),
		};
	}

	private checkExit(position: OpenPosition, row: SignalRow): ExitFill | null {
		const stopHit =
			position.side === "LONG"
				? row.low <= position.stopLossPrice
				: row.high >= position.stopLossPrice;
		if (stopHit) {
			return { price: position.stopLossPrice, reason: "STOP_LOSS" };
		}
		const targetHit =
			position.side === "LONG"
				? row.high >= position.takeProfitPrice
				: row.low <= position.takeProfitPrice;
		if (targetHit) {
			return { price: position.takeProfitPrice, reason: "TAKE_PROFIT" };
		}
		return null;
	}

	private closePosition(
		account: PaperAccount,
		position: OpenPosition,
		row: SignalRow,
		fill: ExitFill
	): Trade {
		const grossPnl = this.unrealizedPnl(position, fill.price);
		const exitCommission = this.riskManager.commissionFor(
			fill.price,
			position.size
		);
		const pnl = grossPnl - position.entryCommission - exitCommission;
		const notional = position.entryPrice * position.size;
		const trade: Trade = {
			side: position.side,
			entryTimestamp: position.entryTimestamp,
			exitTimestamp: row.timestamp,
			entryPrice: position.entryPrice,
			exitPrice: fill.price,
			size: position.size,
			stopLossPrice: position.stopLossPrice,
			takeProfitPrice: position.takeProfitPrice,
			exitReason: fill.reason,
			commission: position.entryCommission + exitCommission,
			pnl,
			returnPct: notional !== 0 ? (pnl / notional) * 100 : 0,
			barsHeld: row.index - position.entryIndex,
		};
		account.registerClosedTrade(trade, grossPnl, exitCommission);
		simLogger.debug("trade_closed", { symbol: this.config.symbol, ...trade });
		return trade;
	}

	private unrealizedPnl(position: OpenPosition, price: number): number {
		return (
			(price - position.entryPrice) * position.size * sideSign(position.side)
		);
	}
}
