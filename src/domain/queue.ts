import type * as types from "../types";
import { DuplicateTeamError, OutOfOrderArrivalError } from "../errors";

/**
 * First-in-first-out queue of team requests
 *
 * Teams are kept sorted by arrival sequence. Equal sequence numbers keep
 * the order they were enqueued in. Ids are remembered for the queue's
 * whole life, so a team that was already dequeued cannot come back.
 */
export class ArrivalQueue {
    private readonly _pending: types.Team[] = [];
    private readonly _seen: Set<string> = new Set();
    private _highestSeq = 0;
    private _lastDequeuedSeq: number | null = null;

    get size(): number {
        return this._pending.length;
    }

    /**
     * Add a team at its arrival position
     *
     * @throws {DuplicateTeamError} If the team id was enqueued before
     * @throws {OutOfOrderArrivalError} If a later arrival was already dequeued
     */
    enqueue(team: types.Team): void {
        this.enqueueAll([team]);
    }

    /**
     * Add a batch of teams, all or nothing
     *
     * Every team is checked before any is queued, so a rejected batch leaves
     * the queue as it was.
     *
     * @throws {DuplicateTeamError} If an id repeats within the batch or was enqueued before
     * @throws {OutOfOrderArrivalError} If a later arrival was already dequeued
     */
    enqueueAll(teams: readonly types.Team[]): void {
        const batchIds = new Set<string>();
        for (const team of teams) {
            if (this._seen.has(team.id) || batchIds.has(team.id)) {
                throw new DuplicateTeamError(team.id);
            }
            if (this._lastDequeuedSeq !== null && team.arrivalSeq < this._lastDequeuedSeq) {
                throw new OutOfOrderArrivalError(team.id, team.arrivalSeq, this._lastDequeuedSeq);
            }
            batchIds.add(team.id);
        }

        teams.forEach(team => this.insert(team));
    }

    has(teamId: string): boolean {
        return this._seen.has(teamId);
    }

    private insert(team: types.Team): void {
        // Insert after every team with a lower or equal sequence number
        const index = this._pending.findIndex(pending => pending.arrivalSeq > team.arrivalSeq);
        if (index === -1) {
            this._pending.push(team);
        } else {
            this._pending.splice(index, 0, team);
        }

        this._seen.add(team.id);
        this._highestSeq = Math.max(this._highestSeq, team.arrivalSeq);
    }

    /**
     * Enqueue a team under the next arrival number
     *
     * Numbers start at 1 and continue above the highest sequence seen so far.
     *
     * @param teamId - Identifier of the requesting team
     * @returns The team as it was queued
     */
    request(teamId: string): types.Team {
        const team: types.Team = { id: teamId, arrivalSeq: this._highestSeq + 1 };
        this.enqueue(team);
        return team;
    }

    peek(): types.Team | undefined {
        return this._pending[0];
    }

    dequeue(): types.Team | undefined {
        const team = this._pending.shift();
        if (team) {
            this._lastDequeuedSeq = team.arrivalSeq;
        }
        return team;
    }

    /**
     * Dequeue every pending team in arrival order
     */
    drain(): types.Team[] {
        const teams: types.Team[] = [];
        for (let team = this.dequeue(); team; team = this.dequeue()) {
            teams.push(team);
        }
        return teams;
    }

    /**
     * Forget every team, pending or processed
     */
    clear(): void {
        this._pending.length = 0;
        this._seen.clear();
        this._highestSeq = 0;
        this._lastDequeuedSeq = null;
    }
}
