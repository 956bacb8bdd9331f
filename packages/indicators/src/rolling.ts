export type ExtremumKind = "max" | "min";

const assertWindow = (window: number): void => {
	if (!Number.isInteger(window) || window < 1) {
		throw new RangeError(`Window length must be a positive integer, got ${window}`);
	}
};

/**
 * Sliding-window maximum or minimum over a stream, backed by a monotonic
 * deque: each push is amortized O(1).
 */
export class RollingExtremum {
	private readonly indices: number[] = [];
	private readonly values: number[] = [];
	private head = 0;
	private pushed = 0;

	constructor(
		private readonly window: number,
		private readonly kind: ExtremumKind
	) {
		assertWindow(window);
	}

	/** Adds the next value; returns the extremum once the window is full. */
	push(value: number): number | null {
		const index = this.pushed;
		this.pushed += 1;

		while (
			this.values.length > this.head &&
			this.dominates(value, this.values[this.values.length - 1])
		) {
			this.values.pop();
			this.indices.pop();
		}
		this.values.push(value);
		this.indices.push(index);

		while (this.indices[this.head] <= index - this.window) {
			this.head += 1;
		}
		this.compact();

		return this.pushed >= this.window ? this.values[this.head] : null;
	}

	private dominates(candidate: number, existing: number): boolean {
		return this.kind === "max" ? candidate >= existing : candidate <= existing;
	}

	private compact(): void {
		if (this.head > 1024 && this.head * 2 > this.values.length) {
			this.values.splice(0, this.head);
			this.indices.splice(0, this.head);
			this.head = 0;
		}
	}
}

/**
 * Number of true flags among the last `window` pushes, maintained as a
 * running total over a ring buffer.
 */
export class RollingCount {
	private readonly ring: boolean[];
	private cursor = 0;
	private filled = 0;
	private total = 0;

	constructor(private readonly window: number) {
		assertWindow(window);
		this.ring = new Array<boolean>(window).fill(false);
	}

	push(flag: boolean): number {
		if (this.filled === this.window) {
			if (this.ring[this.cursor]) {
				this.total -= 1;
			}
		} else {
			this.filled += 1;
		}
		this.ring[this.cursor] = flag;
		if (flag) {
			this.total += 1;
		}
		this.cursor = (this.cursor + 1) % this.window;
		return this.total;
	}

	get count(): number {
		return this.total;
	}

	get full(): boolean {
		return this.filled === this.window;
	}

	/** True when the window is full and every flag in it is set. */
	get all(): boolean {
		return this.full && this.total === this.window;
	}
}
