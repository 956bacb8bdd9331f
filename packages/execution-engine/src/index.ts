export { PaperAccount } from "./paperAccount";
export type { PaperAccountSnapshot } from "./paperAccount";
export { TradeSimulator } from "./simulator";
export type {
	RuinState,
	SimulationResult,
	SimulatorConfig,
	SkippedSignalReason,
} from "./simulator";
