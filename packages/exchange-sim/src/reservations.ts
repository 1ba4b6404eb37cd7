import { Decimal } from "decimal.js";
import type { Reservation } from "./types";

const ZERO = new Decimal(0);

/**
 * Locked balances per asset. Each reservation is created once at placement
 * and released once, for the exact amount, when its order leaves NEW.
 */
export class ReservationBook {
	private readonly locked = new Map<string, Decimal>();

	lockedOf(asset: string): Decimal {
		return this.locked.get(asset) ?? ZERO;
	}

	reserve(asset: string, amount: Decimal.Value): Reservation {
		const value = new Decimal(amount);
		if (!value.isFinite() || value.isNegative()) {
			throw new Error(
				`Reservation amount must be non-negative, got ${value.toString()}`
			);
		}
		this.locked.set(asset, this.lockedOf(asset).plus(value));
		return { asset, amount: value };
	}

	release(reservation: Reservation): void {
		const current = this.lockedOf(reservation.asset);
		if (reservation.amount.gt(current)) {
			throw new Error(
				`Cannot release ${reservation.amount.toString()} ${reservation.asset}: only ${current.toString()} locked`
			);
		}
		const remaining = current.minus(reservation.amount);
		if (remaining.isZero()) {
			this.locked.delete(reservation.asset);
		} else {
			this.locked.set(reservation.asset, remaining);
		}
	}

	snapshot(): Record<string, Decimal> {
		return Object.fromEntries(this.locked);
	}
}
