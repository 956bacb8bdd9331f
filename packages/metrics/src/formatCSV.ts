import type { Trade } from "@senko/core";
import {
	SUMMARY_COLUMNS,
	type BacktestStatistics,
	type BatchSummaryRow,
} from "./metricsSchema";

export interface FormatCsvOptions {
	includeHeader?: boolean;
}

export const formatTradesCsv = (
	trades: readonly Trade[],
	symbol: string,
	options: FormatCsvOptions = {}
): string =>
	toCsv(
		TRADE_COLUMNS,
		trades.map((trade) => ({
			symbol,
			side: trade.side,
			entryTime: toIso(trade.entryTimestamp),
			exitTime: toIso(trade.exitTimestamp),
			entryPrice: trade.entryPrice,
			exitPrice: trade.exitPrice,
			size: trade.size,
			stopLossPrice: trade.stopLossPrice,
			takeProfitPrice: trade.takeProfitPrice,
			exitReason: trade.exitReason,
			commission: trade.commission,
			pnl: trade.pnl,
			returnPct: trade.returnPct,
			barsHeld: trade.barsHeld,
		})),
		options.includeHeader ?? true
	);

const TRADE_COLUMNS = [
	"symbol",
	"side",
	"entryTime",
	"exitTime",
	"entryPrice",
	"exitPrice",
	"size",
	"stopLossPrice",
	"takeProfitPrice",
	"exitReason",
	"commission",
	"pnl",
	"returnPct",
	"barsHeld",
];

export const formatStatisticsCsv = (
	statistics: BacktestStatistics,
	symbol: string,
	options: FormatCsvOptions = {}
): string => {
	const row: Record<string, unknown> = { symbol, ...statistics };
	row.startTimestamp = toIso(statistics.startTimestamp);
	row.endTimestamp = toIso(statistics.endTimestamp);
	return toCsv(Object.keys(row), [row], options.includeHeader ?? true);
};

export const formatBatchSummaryCsv = (
	rows: readonly BatchSummaryRow[],
	options: FormatCsvOptions = {}
): string =>
	toCsv(
		["symbol", "status", ...SUMMARY_COLUMNS, "error"],
		rows.map((row) => ({
			...row.values,
			symbol: row.symbol,
			status: row.status,
			error: row.error,
		})),
		options.includeHeader ?? true
	);

const toIso = (timestamp: number | null): string | null =>
	timestamp === null ? null : new Date(timestamp).toISOString();

export const toCsv = (
	headers: readonly string[],
	rows: readonly Record<string, unknown>[],
	includeHeader: boolean
): string => {
	const lines: string[] = [];
	if (includeHeader) {
		lines.push(headers.map(formatValue).join(","));
	}
	for (const row of rows) {
		lines.push(headers.map((header) => formatValue(row[header])).join(","));
	}
	return lines.join("\n");
};

export const formatValue = (value: unknown): string => {
	if (value === null || value === undefined) {
		return "";
	}
	if (typeof value === "string") {
		if (/[",\n\r]/.test(value)) {
			return `"${value.replace(/"/g, '""')}"`;
		}
		return value;
	}
	if (typeof value === "number") {
		return Number.isNaN(value) ? "" : value.toString();
	}
	return String(value);
};
