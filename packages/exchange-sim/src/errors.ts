import type { OrderSide } from "@btsim/core";

export type ExchangeErrorDetail =
	| {
			kind: "UnsupportedOrderType";
			symbol: string;
			side: OrderSide;
			type: string;
	  }
	| {
			kind: "ImmediateTrigger";
			symbol: string;
			side: OrderSide;
			stopPrice: string;
			openPrice: string;
	  }
	| {
			kind: "InsufficientBalance";
			symbol: string;
			side: OrderSide;
			asset: string;
			required: string;
			free: string;
	  }
	| {
			kind: "InvalidQuery";
			field: string;
			reason: string;
	  }
	| {
			kind: "InvalidOrderRecord";
			field: string;
			reason: string;
	  };

export type ExchangeErrorKind = ExchangeErrorDetail["kind"];

export type ExchangeErrorDetailOf<K extends ExchangeErrorKind> = Extract<
	ExchangeErrorDetail,
	{ kind: K }
>;

const describe = (detail: ExchangeErrorDetail): string => {
	switch (detail.kind) {
		case "UnsupportedOrderType":
			return `Order type ${detail.type} is not supported; only STOP_LOSS orders can be placed`;
		case "ImmediateTrigger":
			return `${detail.side} stop ${detail.stopPrice} on ${detail.symbol} would trigger immediately against open ${detail.openPrice}`;
		case "InsufficientBalance":
			return `Insufficient ${detail.asset} for ${detail.side} on ${detail.symbol}: required ${detail.required}, free ${detail.free}`;
		case "InvalidQuery":
			return `Invalid parameter ${detail.field}: ${detail.reason}`;
		case "InvalidOrderRecord":
			return `Invalid order record field ${detail.field}: ${detail.reason}`;
	}
};

/**
 * Domain failure raised by the simulated exchange. The `detail` union is the
 * error's identity; the message is derived from it.
 */
export class ExchangeSimulatorError extends Error {
	readonly detail: ExchangeErrorDetail;

	constructor(detail: ExchangeErrorDetail) {
		super(describe(detail));
		this.name = "ExchangeSimulatorError";
		this.detail = detail;
	}

	get kind(): ExchangeErrorKind {
		return this.detail.kind;
	}
}

export const isExchangeSimulatorError = <K extends ExchangeErrorKind>(
	error: unknown,
	kind?: K
): error is ExchangeSimulatorError & { detail: ExchangeErrorDetailOf<K> } =>
	error instanceof ExchangeSimulatorError &&
	(kind === undefined || error.detail.kind === kind);

export interface ExchangeErrorPayload {
	code: number;
	msg: string;
}

/**
 * Renders a domain error as the `{ code, msg }` body a spot exchange API
 * would answer with.
 */
export const formatExchangeError = (
	error: ExchangeSimulatorError
): ExchangeErrorPayload => {
	const { detail } = error;
	switch (detail.kind) {
		case "InsufficientBalance":
			return {
				code: -2010,
				msg: "Account has insufficient balance for requested action.",
			};
		case "ImmediateTrigger":
			return { code: -2010, msg: "Stop price would trigger immediately." };
		case "UnsupportedOrderType":
			return { code: -1116, msg: "Invalid orderType." };
		case "InvalidQuery":
			return {
				code: -1100,
				msg: `Illegal characters found in parameter '${detail.field}'; ${detail.reason}.`,
			};
		case "InvalidOrderRecord":
			return {
				code: -1000,
				msg: "An unknown error occurred while processing the request.",
			};
	}
};
