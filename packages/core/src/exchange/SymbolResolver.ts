import type { SymbolAssets } from "../types";

/**
 * Resolves a trading pair into its base and quote assets.
 * Implementations must throw for symbols they do not know.
 */
export interface SymbolResolver {
	resolve(symbol: string): SymbolAssets;
}

export class StaticSymbolResolver implements SymbolResolver {
	private readonly entries = new Map<string, SymbolAssets>();

	constructor(entries: Record<string, SymbolAssets>) {
		for (const [symbol, assets] of Object.entries(entries)) {
			this.entries.set(symbol.toUpperCase(), {
				baseAsset: assets.baseAsset.toUpperCase(),
				quoteAsset: assets.quoteAsset.toUpperCase(),
			});
		}
	}

	resolve(symbol: string): SymbolAssets {
		const assets = this.entries.get(symbol.toUpperCase());
		if (!assets) {
			throw new Error(`Unknown symbol: ${symbol}`);
		}
		return { ...assets };
	}

	symbols(): string[] {
		return Array.from(this.entries.keys());
	}
}
