import { describe, expect, it } from "vitest";
import {
	ExchangeSimulatorError,
	formatExchangeError,
	isExchangeSimulatorError,
} from "./errors";

describe("ExchangeSimulatorError", () => {
	it("derives its message from the detail", () => {
		const error = new ExchangeSimulatorError({
			kind: "InsufficientBalance",
			symbol: "ADAUSDC",
			side: "BUY",
			asset: "USDC",
			required: "1000",
			free: "100",
		});

		expect(error.kind).toBe("InsufficientBalance");
		expect(error.name).toBe("ExchangeSimulatorError");
		expect(error.message).toBe(
			"Insufficient USDC for BUY on ADAUSDC: required 1000, free 100"
		);
	});

	it("narrows by kind", () => {
		const error: unknown = new ExchangeSimulatorError({
			kind: "InvalidQuery",
			field: "limit",
			reason: "must be an integer",
		});

		expect(isExchangeSimulatorError(error)).toBe(true);
		expect(isExchangeSimulatorError(error, "InvalidQuery")).toBe(true);
		expect(isExchangeSimulatorError(error, "ImmediateTrigger")).toBe(false);
		expect(isExchangeSimulatorError(new Error("plain"))).toBe(false);
	});
});

describe("formatExchangeError", () => {
	it("maps each kind to an exchange error body", () => {
		expect(
			formatExchangeError(
				new ExchangeSimulatorError({
					kind: "InsufficientBalance",
					symbol: "ADAUSDC",
					side: "SELL",
					asset: "ADA",
					required: "5",
					free: "1",
				})
			)
		).toEqual({
			code: -2010,
			msg: "Account has insufficient balance for requested action.",
		});
		expect(
			formatExchangeError(
				new ExchangeSimulatorError({
					kind: "ImmediateTrigger",
					symbol: "ADAUSDC",
					side: "BUY",
					stopPrice: "5",
					openPrice: "6",
				})
			)
		).toEqual({ code: -2010, msg: "Stop price would trigger immediately." });
		expect(
			formatExchangeError(
				new ExchangeSimulatorError({
					kind: "UnsupportedOrderType",
					symbol: "ADAUSDC",
					side: "BUY",
					type: "LIMIT",
				})
			)
		).toEqual({ code: -1116, msg: "Invalid orderType." });
		expect(
			formatExchangeError(
				new ExchangeSimulatorError({
					kind: "InvalidQuery",
					field: "limit",
					reason: "must be an integer",
				})
			)
		).toEqual({
			code: -1100,
			msg: "Illegal characters found in parameter 'limit'; must be an integer.",
		});
		expect(
			formatExchangeError(
				new ExchangeSimulatorError({
					kind: "InvalidOrderRecord",
					field: "orderId",
					reason: "expected an integer",
				})
			).code
		).toBe(-1000);
	});
});
