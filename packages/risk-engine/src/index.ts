import type { ActivePositionSide } from "@senko/core";

export interface RiskConfig {
	/** Stop distance in volatility units. */
	stopMultiplier: number;
	/** Target distance as a multiple of the stop distance. */
	rewardMultiplier: number;
	/** Share of buying power committed per entry. */
	positionSizeFraction: number;
	/** Equity required per unit of notional; 0.1 allows 10x notional. */
	marginRatio: number;
	commissionRate: number;
}

export interface BracketPlan {
	positionSide: ActivePositionSide;
	side: "buy" | "sell";
	entryPrice: number;
	quantity: number;
	stopLossPrice: number;
	takeProfitPrice: number;
	stopDistance: number;
	targetDistance: number;
}

export type EntryRejectionReason =
	| "invalid_price"
	| "non_positive_volatility"
	| "non_positive_equity"
	| "invalid_size";

export type EntryPlanResult =
	| { status: "planned"; plan: BracketPlan }
	| { status: "rejected"; reason: EntryRejectionReason };

const reject = (reason: EntryRejectionReason): EntryPlanResult => ({
	status: "rejected",
	reason,
});

export class RiskManager {
	constructor(private readonly config: RiskConfig) {}

	/**
	 * Bracket for a market entry at `entryPrice`: stop and target are placed
	 * volatility-scaled distances away, and the size spends the configured
	 * fraction of margin-adjusted buying power, net of entry commission.
	 */
	planEntry(
		positionSide: ActivePositionSide,
		entryPrice: number,
		volatility: number,
		accountEquity: number
	): EntryPlanResult {
		if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
			return reject("invalid_price");
		}
		if (!Number.isFinite(volatility) || volatility <= 0) {
			return reject("non_positive_volatility");
		}
		if (!Number.isFinite(accountEquity) || accountEquity <= 0) {
			return reject("non_positive_equity");
		}

		const stopDistance = volatility * this.config.stopMultiplier;
		const targetDistance = stopDistance * this.config.rewardMultiplier;
		const quantity = this.calculatePositionSize(accountEquity, entryPrice);
		if (quantity === null) {
			return reject("invalid_size");
		}

		return {
			status: "planned",
			plan: {
				positionSide,
				side: this.getOrderSide(positionSide),
				entryPrice,
				quantity,
				stopLossPrice: this.calculateStopLoss(
					entryPrice,
					stopDistance,
					positionSide
				),
				takeProfitPrice: this.calculateTakeProfit(
					entryPrice,
					targetDistance,
					positionSide
				),
				stopDistance,
				targetDistance,
			},
		};
	}

	commissionFor(price: number, quantity: number): number {
		return Math.abs(price * quantity) * this.config.commissionRate;
	}

	private calculateStopLoss(
		price: number,
		distance: number,
		positionSide: ActivePositionSide
	): number {
		return positionSide === "LONG" ? price - distance : price + distance;
	}

	private calculateTakeProfit(
		price: number,
		distance: number,
		positionSide: ActivePositionSide
	): number {
		return positionSide === "LONG" ? price + distance : price - distance;
	}

	private calculatePositionSize(
		accountEquity: number,
		entryPrice: number
	): number | null {
		const buyingPower = accountEquity / this.config.marginRatio;
		const size =
			(buyingPower * this.config.positionSizeFraction) /
			(entryPrice * (1 + this.config.commissionRate));
		if (!Number.isFinite(size) || size <= 0) {
			return null;
		}
		return size;
	}

	private getOrderSide(positionSide: ActivePositionSide): "buy" | "sell" {
		return positionSide === "LONG" ? "buy" : "sell";
	}
}
