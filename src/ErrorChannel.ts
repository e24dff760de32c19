import { describeError, type CollabException } from "./Exceptions";
import { Observable } from "./observable/Observable";

/**
 * Where components report failures they recover from instead of throwing:
 * fail-open staleness checks, transport failures, undecodable remote payloads.
 */
export class ErrorChannel extends Observable<CollabException> {
	private _reported = 0;

	constructor(context = "errors") {
		super(context);
	}

	get reported(): number {
		return this._reported;
	}

	report(error: CollabException): void {
		this._reported++;
		this.warn(`${error.name}: ${describeError(error)}`);
		this.notifyListeners(error);
	}
}
