import { describe, expect, it } from "vitest";
import { RiskManager } from "./index";
import type { BracketPlan, EntryPlanResult, RiskConfig } from "./index";

const baseRiskConfig: RiskConfig = {
	stopMultiplier: 1.5,
	rewardMultiplier: 2,
	positionSizeFraction: 0.99,
	marginRatio: 0.1,
	commissionRate: 0.0002,
};

const createManager = (overrides: Partial<RiskConfig> = {}): RiskManager =>
	new RiskManager({ ...baseRiskConfig, ...overrides });

const expectPlan = (result: EntryPlanResult): BracketPlan => {
	if (result.status !== "planned") {
		throw new Error(`expected a plan, got ${result.reason}`);
	}
	return result.plan;
};

describe("RiskManager.planEntry", () => {
	it("places a long stop and target from volatility", () => {
		const plan = expectPlan(createManager().planEntry("LONG", 100, 2, 1_000_000));
		expect(plan.side).toBe("buy");
		expect(plan.stopLossPrice).toBe(97);
		expect(plan.takeProfitPrice).toBe(106);
		expect(plan.stopDistance).toBe(3);
		expect(plan.targetDistance).toBe(6);
	});

	it("mirrors the bracket for shorts", () => {
		const plan = expectPlan(createManager().planEntry("SHORT", 100, 2, 1_000_000));
		expect(plan.side).toBe("sell");
		expect(plan.stopLossPrice).toBe(103);
		expect(plan.takeProfitPrice).toBe(94);
	});

	it("sizes from margin-adjusted buying power net of commission", () => {
		const plan = expectPlan(createManager().planEntry("LONG", 100, 2, 1_000_000));
		expect(plan.quantity).toBeCloseTo(9_900_000 / 100.02, 9);
	});

	it("allows fractional sizes", () => {
		const manager = createManager({ marginRatio: 1, commissionRate: 0, positionSizeFraction: 1 });
		const plan = expectPlan(manager.planEntry("LONG", 400, 1, 1_000));
		expect(plan.quantity).toBe(2.5);
	});

	it("rejects entries without positive volatility", () => {
		expect(createManager().planEntry("LONG", 100, 0, 1_000)).toEqual({
			status: "rejected",
			reason: "non_positive_volatility",
		});
		expect(createManager().planEntry("LONG", 100, Number.NaN, 1_000)).toEqual({
			status: "rejected",
			reason: "non_positive_volatility",
		});
	});

	it("rejects entries once equity is exhausted", () => {
		expect(createManager().planEntry("SHORT", 100, 2, 0)).toEqual({
			status: "rejected",
			reason: "non_positive_equity",
		});
	});

	it("charges commission on notional", () => {
		expect(createManager().commissionFor(100, 50)).toBeCloseTo(1, 12);
	});
});
