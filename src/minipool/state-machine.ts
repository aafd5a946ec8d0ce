/**
 * MinipoolStateMachine — validated minipool lifecycle FSM.
 *
 *   PreLaunch ─launch→ Staking ─exit→ Exited ─withdraw→ Withdrawn
 *   PreLaunch ─time_out→ TimedOut
 *   any non-Closed ─close→ Closed
 *
 * History is bounded (last N transitions). The empty-ledger rule for close
 * belongs to the minipool, which owns the ledger.
 */

import { FailureCode, StateError } from "../shared/errors.js";
import { type Result, err, ok } from "../shared/result.js";
import { type Clock, SystemClock } from "../shared/time.js";
import {
	MinipoolStatus,
	type MinipoolTransition,
	type TransitionEntry,
	type WithdrawalKind,
} from "./types.js";

const MAX_HISTORY = 50;

export class MinipoolStateMachine {
	private current: MinipoolStatus;
	private readonly transitions: TransitionEntry[];
	private readonly clock: Clock;

	constructor(clock: Clock = SystemClock) {
		this.clock = clock;
		this.current = MinipoolStatus.PreLaunch;
		this.transitions = [];
	}

	// ── Queries ────────────────────────────────────────────────────

	status(): MinipoolStatus {
		return this.current;
	}

	history(): readonly TransitionEntry[] {
		return this.transitions;
	}

	// ── Transitions ────────────────────────────────────────────────

	transition(t: MinipoolTransition): Result<MinipoolStatus, StateError> {
		const from = this.current;
		const to = nextStatus(from, t);
		if (to === null) {
			return err(
				new StateError(FailureCode.InvalidTransition, `Cannot ${t.type} a minipool in ${from}`, {
					from,
					transition: t.type,
				}),
			);
		}

		this.recordTransition(from, to, t);
		this.current = to;
		return ok(to);
	}

	private recordTransition(from: MinipoolStatus, to: MinipoolStatus, t: MinipoolTransition): void {
		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		this.transitions.push({ from, to, transition: t.type, timestamp: this.clock.now() });
	}
}

function nextStatus(from: MinipoolStatus, t: MinipoolTransition): MinipoolStatus | null {
	switch (t.type) {
		case "launch":
			return from === MinipoolStatus.PreLaunch ? MinipoolStatus.Staking : null;
		case "exit":
			return from === MinipoolStatus.Staking ? MinipoolStatus.Exited : null;
		case "withdraw":
			return from === MinipoolStatus.Exited ? MinipoolStatus.Withdrawn : null;
		case "time_out":
			return from === MinipoolStatus.PreLaunch ? MinipoolStatus.TimedOut : null;
		case "close":
			return from === MinipoolStatus.Closed ? null : MinipoolStatus.Closed;
	}
}

// ── Status gates ─────────────────────────────────────────────────────

export function acceptsDeposits(status: MinipoolStatus): boolean {
	return status === MinipoolStatus.PreLaunch;
}

export function permitsWithdrawal(status: MinipoolStatus, kind: WithdrawalKind): boolean {
	switch (kind) {
		case "staking":
			return status === MinipoolStatus.Staking;
		case "exited":
			return status === MinipoolStatus.Exited || status === MinipoolStatus.Withdrawn;
	}
}

export function permitsStalledRefund(status: MinipoolStatus): boolean {
	return status === MinipoolStatus.TimedOut;
}

export function isTerminal(status: MinipoolStatus): boolean {
	return status === MinipoolStatus.Closed;
}
