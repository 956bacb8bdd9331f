import type { Trade } from "@senko/core";

export interface PaperAccountSnapshot {
	startingBalance: number;
	balance: number;
	equity: number;
	totalRealizedPnl: number;
	totalCommission: number;
	maxEquity: number;
	maxDrawdown: number;
	trades: {
		total: number;
		wins: number;
		losses: number;
		breakeven: number;
	};
	lastTrade?: Trade;
}

/**
 * Cash ledger for a simulated account. Commission is debited when charged;
 * price moves are realized when a trade closes.
 */
export class PaperAccount {
	private readonly startingBalance: number;
	private balance: number;
	private equity: number;
	private maxEquity: number;
	private totalCommission = 0;
	private trades: {
		total: number;
		wins: number;
		losses: number;
		breakeven: number;
	};
	private lastTrade?: Trade;

	constructor(startingBalance: number) {
		this.startingBalance = startingBalance;
		this.balance = startingBalance;
		this.equity = startingBalance;
		this.maxEquity = startingBalance;
		this.trades = {
			total: 0,
			wins: 0,
			losses: 0,
			breakeven: 0,
		};
	}

	get cash(): number {
		return this.balance;
	}

	chargeCommission(amount: number): void {
		this.balance -= amount;
		this.totalCommission += amount;
	}

	/**
	 * Books a closed trade: the gross price move is credited and the exit
	 * commission debited. The entry commission was charged at entry.
	 */
	registerClosedTrade(
		trade: Trade,
		grossPnl: number,
		exitCommission: number
	): PaperAccountSnapshot {
		this.balance += grossPnl;
		this.chargeCommission(exitCommission);
		this.trades.total += 1;

		if (trade.pnl > 0) {
			this.trades.wins += 1;
		} else if (trade.pnl < 0) {
			this.trades.losses += 1;
		} else {
			this.trades.breakeven += 1;
		}

		this.lastTrade = trade;

		return this.snapshot(0);
	}

	snapshot(unrealizedPnl: number): PaperAccountSnapshot {
		this.equity = this.balance + unrealizedPnl;
		if (this.equity > this.maxEquity) {
			this.maxEquity = this.equity;
		}

		const maxDrawdown = this.maxEquity - this.equity;

		return {
			startingBalance: this.startingBalance,
			balance: this.balance,
			equity: this.equity,
			totalRealizedPnl: this.balance - this.startingBalance,
			totalCommission: this.totalCommission,
			maxEquity: this.maxEquity,
			maxDrawdown,
			trades: { ...this.trades },
			lastTrade: this.lastTrade,
		};
	}
}
