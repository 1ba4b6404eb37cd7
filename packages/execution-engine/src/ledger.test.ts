import { describe, expect, it } from "vitest";
import { Ledger, parseDecimal } from "./ledger";

describe("Ledger", () => {
	it("debits cash and credits the position on a buy", () => {
		const ledger = new Ledger({ initialCash: 100 });

		expect(ledger.applyBuy("ADAUSDC", 10, 5)).toBe(true);
		expect(ledger.getCash().toString()).toBe("50");
		expect(ledger.getPosition("ADAUSDC").toString()).toBe("10");
	});

	it("charges commission on top of the cost", () => {
		const ledger = new Ledger({ initialCash: 100, commissionRate: "0.01" });

		expect(ledger.applyBuy("ADAUSDC", 10, 5)).toBe(true);
		expect(ledger.getCash().toString()).toBe("49.5");
	});

	it("skips the fee when asked", () => {
		const ledger = new Ledger({ initialCash: 100, commissionRate: "0.01" });

		expect(
			ledger.applyBuy("ADAUSDC", 10, 5, { chargeCommission: false })
		).toBe(true);
		expect(ledger.getCash().toString()).toBe("50");
	});

	it("refuses a buy the cash cannot cover, fee included", () => {
		const ledger = new Ledger({ initialCash: 50, commissionRate: "0.001" });

		expect(ledger.applyBuy("ADAUSDC", 10, 5)).toBe(false);
		expect(ledger.getCash().toString()).toBe("50");
		expect(ledger.getPosition("ADAUSDC").toString()).toBe("0");
	});

	it("credits proceeds net of fee on a sell", () => {
		const ledger = new Ledger({
			initialCash: 0,
			commissionRate: "0.01",
			initialPositions: { ADAUSDC: 10 },
		});

		expect(ledger.applySell("ADAUSDC", 4, 5)).toBe(true);
		expect(ledger.getCash().toString()).toBe("19.8");
		expect(ledger.getPosition("ADAUSDC").toString()).toBe("6");
	});

	it("refuses to sell more than is held", () => {
		const ledger = new Ledger({
			initialCash: 0,
			initialPositions: { ADAUSDC: 3 },
		});

		expect(ledger.applySell("ADAUSDC", 5, 1)).toBe(false);
		expect(ledger.getCash().toString()).toBe("0");
		expect(ledger.getPosition("ADAUSDC").toString()).toBe("3");
	});

	it("drops a position sold down to zero", () => {
		const ledger = new Ledger({
			initialCash: 0,
			initialPositions: { ADAUSDC: 2 },
		});

		ledger.applySell("ADAUSDC", 2, 3);
		expect(ledger.getPositions()).toEqual({});
		expect(ledger.getCash().toString()).toBe("6");
	});

	it("keeps decimal amounts exact", () => {
		const ledger = new Ledger({ initialCash: "0.3" });

		expect(ledger.applyBuy("ADAUSDC", "0.1", 1)).toBe(true);
		expect(ledger.applyBuy("ADAUSDC", "0.2", 1)).toBe(true);
		expect(ledger.getCash().isZero()).toBe(true);
		expect(ledger.getPosition("ADAUSDC").toString()).toBe("0.3");
	});

	it("treats non-positive quantities as no-ops", () => {
		const ledger = new Ledger({ initialCash: 100 });

		expect(ledger.applyBuy("ADAUSDC", 0, 5)).toBe(false);
		expect(ledger.applySell("ADAUSDC", -1, 5)).toBe(false);
		expect(ledger.getCash().toString()).toBe("100");
	});

	it("refuses malformed amount strings without touching state", () => {
		const ledger = new Ledger({
			initialCash: 100,
			initialPositions: { ADAUSDC: 5 },
		});

		expect(ledger.applyBuy("ADAUSDC", "abc", 1)).toBe(false);
		expect(ledger.applyBuy("ADAUSDC", 1, "1.2.3")).toBe(false);
		expect(ledger.applySell("ADAUSDC", "", 1)).toBe(false);
		expect(ledger.getCash().toString()).toBe("100");
		expect(ledger.getPosition("ADAUSDC").toString()).toBe("5");
		expect(ledger.snapshot({}).fills).toBe(0);
	});

	it("values positions against the price map, ignoring missing prices", () => {
		const ledger = new Ledger({
			initialCash: 10,
			initialPositions: { ADAUSDC: 10, BTCUSDT: 1 },
		});

		expect(ledger.portfolioValue({ ADAUSDC: "0.5" }).toString()).toBe("15");
		expect(
			ledger.portfolioValue({ ADAUSDC: 1, BTCUSDT: 100 }).toString()
		).toBe("120");
	});

	it("reports a snapshot including the fill count", () => {
		const ledger = new Ledger({ initialCash: 100 });
		ledger.applyBuy("ADAUSDC", 10, 5);

		const snapshot = ledger.snapshot({ ADAUSDC: 6 });
		expect(snapshot.initialCash.toString()).toBe("100");
		expect(snapshot.cash.toString()).toBe("50");
		expect(snapshot.positions.ADAUSDC.toString()).toBe("10");
		expect(snapshot.portfolioValue.toString()).toBe("110");
		expect(snapshot.fills).toBe(1);
	});

	it("validates construction parameters", () => {
		expect(() => new Ledger({ initialCash: -1 })).toThrowError(
			"initialCash must be a non-negative number, got -1"
		);
		expect(
			() => new Ledger({ initialCash: 10, commissionRate: 1 })
		).toThrowError("commissionRate must be within [0, 1), got 1");
	});
});

describe("parseDecimal", () => {
	it("reads well-formed amounts and returns null for malformed ones", () => {
		expect(parseDecimal("1.50")?.toString()).toBe("1.5");
		expect(parseDecimal(2)?.toString()).toBe("2");
		expect(parseDecimal("abc")).toBeNull();
		expect(parseDecimal("1.2.3")).toBeNull();
	});
});
