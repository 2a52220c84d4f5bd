// Memoized once-only computation with re-entry detection

type LazyState<T> =
	| { kind: "unevaluated" }
	| { kind: "evaluating" }
	| { kind: "evaluated"; value: T };

/**
 * Computes its value at most once. Requesting the value while it is being
 * computed throws the error built by `onReentry`; a failed computation
 * leaves the slot unevaluated so nothing partial is cached.
 */
export class Lazy<T> {
	private _state: LazyState<T> = { kind: "unevaluated" };

	constructor(
		private readonly compute: () => T,
		private readonly onReentry: () => Error,
	) {}

	get value(): T {
		switch (this._state.kind) {
		case "evaluated":
			return this._state.value;
		case "evaluating":
			throw this.onReentry();
		case "unevaluated":
			break;
		}
		this._state = { kind: "evaluating" };
		try {
			const value = this.compute();
			this._state = { kind: "evaluated", value };
			return value;
		} catch (error) {
			this._state = { kind: "unevaluated" };
			throw error;
		}
	}

	get isEvaluated(): boolean {
		return this._state.kind === "evaluated";
	}

	get isEvaluating(): boolean {
		return this._state.kind === "evaluating";
	}
}
