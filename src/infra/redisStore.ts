import { WatchError } from "redis";

import { TransientStoreError } from "../services/errors";
import {
	evaluateSetAdd,
	findIndex,
	type AtomicStore,
	type Clock,
	type Condition,
	type IndexQuery,
	type Mutation,
	type RecordDecoder,
	type RecordIndex,
	type SetField,
	type StoredRecord,
	type WriteOutcome,
} from "./atomicStore";

/** Commands queued inside MULTI. */
export interface RedisTransaction {
	set(key: string, value: string): unknown;
	del(key: string): unknown;
	zAdd(key: string, member: { score: number; value: string }): unknown;
	zRem(key: string, member: string): unknown;
	exec(): Promise<unknown>;
}

/** A connection reserved for one WATCH/MULTI/EXEC round. */
export interface RedisIsolatedConnection {
	watch(key: string): Promise<unknown>;
	unwatch(): Promise<unknown>;
	get(key: string): Promise<string | null>;
	multi(): RedisTransaction;
}

export interface RedisScoreRangeOptions {
	BY: "SCORE";
	LIMIT: { offset: number; count: number };
}

/** The part of the node-redis client the store uses. */
export interface RedisCommandClient {
	get(key: string): Promise<string | null>;
	mGet(keys: string[]): Promise<(string | null)[]>;
	zRange(key: string, min: number | string, max: number | string, options: RedisScoreRangeOptions): Promise<string[]>;
	sendCommand(args: string[]): Promise<unknown>;
	executeIsolated<R>(fn: (isolated: RedisIsolatedConnection) => Promise<R>): Promise<R>;
}

export interface RedisStoreOptions<T> {
	collection: string;
	keyPrefix: string;
	timeoutMs: number;
	/** Optimistic transaction attempts before a contended write is reported as transient. */
	casAttempts: number;
	decode: RecordDecoder<T>;
	indexes?: readonly RecordIndex<T>[];
}

type Evaluation<T> = { accepted: true; next: T | null } | { accepted: false };

async function withTimeout<R>(operation: string, timeoutMs: number, task: () => Promise<R>): Promise<R> {
	let timer: NodeJS.Timeout | null = null;
	const timeout = new Promise<never>((_, reject) => {
		timer = setTimeout(() => {
			reject(new TransientStoreError(operation, `timed out after ${timeoutMs}ms`));
		}, timeoutMs);
	});
	try {
		return await Promise.race([task(), timeout]);
	} finally {
		if (timer) {
			clearTimeout(timer);
		}
	}
}

function toTransient(operation: string, error: unknown): TransientStoreError {
	if (error instanceof TransientStoreError) {
		return error;
	}
	const message = error instanceof Error ? error.message : String(error);
	return new TransientStoreError(operation, message, error);
}

/**
 * Lease expiry and record timestamps are taken from the Redis server so that
 * workers on different hosts compare against one clock.
 */
export class RedisServerClock implements Clock {
	constructor(private readonly client: RedisCommandClient, private readonly timeoutMs: number) {}

	async now(): Promise<Date> {
		let reply: unknown;
		try {
			reply = await withTimeout("time", this.timeoutMs, () => this.client.sendCommand(["TIME"]));
		} catch (error) {
			throw toTransient("time", error);
		}
		if (!Array.isArray(reply) || reply.length < 2) {
			throw new TransientStoreError("time", "unexpected TIME reply");
		}
		const seconds = Number(reply[0]);
		const microseconds = Number(reply[1]);
		if (!Number.isFinite(seconds) || !Number.isFinite(microseconds)) {
			throw new TransientStoreError("time", "unexpected TIME reply");
		}
		return new Date(seconds * 1000 + Math.floor(microseconds / 1000));
	}
}

export class RedisAtomicStore<T extends StoredRecord> implements AtomicStore<T> {
	private readonly clock: RedisServerClock;
	private readonly indexes: readonly RecordIndex<T>[];

	constructor(private readonly client: RedisCommandClient, private readonly options: RedisStoreOptions<T>) {
		this.clock = new RedisServerClock(client, options.timeoutMs);
		this.indexes = options.indexes ?? [];
	}

	private key(id: string): string {
		return `${this.options.keyPrefix}:${this.options.collection}:${id}`;
	}

	private indexKey(name: string): string {
		return `${this.options.keyPrefix}:${this.options.collection}-index:${name}`;
	}

	async now(): Promise<Date> {
		return this.clock.now();
	}

	async get(id: string): Promise<T | null> {
		const payload = await this.run("get", () => this.client.get(this.key(id)));
		return this.parse(id, payload);
	}

	async putIfAbsent(record: T): Promise<boolean> {
		return this.optimistic("putIfAbsent", record.id, async (isolated) => {
			if ((await isolated.get(this.key(record.id))) !== null) {
				await isolated.unwatch();
				return false;
			}
			const transaction = isolated.multi();
			this.stage(transaction, record.id, record);
			await transaction.exec();
			return true;
		});
	}

	async updateIfCondition(id: string, mutation: Mutation<T>, condition: Condition<T>): Promise<WriteOutcome<T>> {
		return this.readModifyWrite("updateIfCondition", id, (current) =>
			condition(current) ? { accepted: true, next: mutation(current) } : { accepted: false }
		);
	}

	async addToSet(
		id: string,
		field: SetField<T>,
		value: string,
		condition: Condition<T>,
		mutation?: Mutation<T>
	): Promise<WriteOutcome<T>> {
		return this.readModifyWrite("addToSet", id, (current) => evaluateSetAdd(current, field, value, condition, mutation));
	}

	async deleteIfCondition(id: string, condition: Condition<T>): Promise<WriteOutcome<T>> {
		return this.readModifyWrite("deleteIfCondition", id, (current) =>
			condition(current) ? { accepted: true, next: null } : { accepted: false }
		);
	}

	/** One bounded ZRANGE BYSCORE followed by one MGET. */
	async listIndexed(index: string, query: IndexQuery): Promise<T[]> {
		const definition = findIndex(this.indexes, index);
		if (query.limit <= 0) {
			return [];
		}
		const ids = await this.run("listIndexed", () =>
			this.client.zRange(this.indexKey(definition.name), "-inf", query.maxScore ?? "+inf", {
				BY: "SCORE",
				LIMIT: { offset: 0, count: query.limit },
			})
		);
		if (ids.length === 0) {
			return [];
		}

		const payloads = await this.run("listIndexed", () => this.client.mGet(ids.map((id) => this.key(id))));
		const result: T[] = [];
		ids.forEach((id, position) => {
			const record = this.parse(id, payloads[position] ?? null);
			if (record && definition.score(record) !== null) {
				result.push(record);
			} else {
				console.warn("[redisStore] index entry without a matching record", { index: definition.name, id });
			}
		});
		return result;
	}

	/**
	 * WATCH / GET / MULTI / EXEC. An aborted EXEC means another writer touched
	 * the key, so the record is read again and the condition re-evaluated.
	 */
	private async readModifyWrite(
		operation: string,
		id: string,
		evaluate: (current: T) => Evaluation<T>
	): Promise<WriteOutcome<T>> {
		return this.optimistic(operation, id, async (isolated): Promise<WriteOutcome<T>> => {
			const current = this.parse(id, await isolated.get(this.key(id)));
			if (!current) {
				await isolated.unwatch();
				return { status: "missing" };
			}

			const evaluation = evaluate(current);
			if (!evaluation.accepted) {
				await isolated.unwatch();
				return { status: "conflict", current };
			}

			const transaction = isolated.multi();
			this.stage(transaction, id, evaluation.next);
			await transaction.exec();
			return { status: "written", record: evaluation.next ?? current };
		});
	}

	private async optimistic<R>(
		operation: string,
		id: string,
		body: (isolated: RedisIsolatedConnection) => Promise<R>
	): Promise<R> {
		const key = this.key(id);
		for (let attempt = 1; attempt <= this.options.casAttempts; attempt += 1) {
			try {
				return await withTimeout(operation, this.options.timeoutMs, () =>
					this.client.executeIsolated(async (isolated) => {
						await isolated.watch(key);
						return body(isolated);
					})
				);
			} catch (error) {
				if (error instanceof WatchError) {
					console.debug("[redisStore] optimistic write contended", { key, attempt });
					continue;
				}
				throw toTransient(operation, error);
			}
		}
		throw new TransientStoreError(operation, `gave up on ${key} after ${this.options.casAttempts} contended attempts`);
	}

	/** Queues the record write and its index entries in the same transaction. */
	private stage(transaction: RedisTransaction, id: string, next: T | null): void {
		const key = this.key(id);
		if (next === null) {
			transaction.del(key);
		} else {
			transaction.set(key, JSON.stringify(next));
		}
		for (const index of this.indexes) {
			const score = next === null ? null : index.score(next);
			if (score === null) {
				transaction.zRem(this.indexKey(index.name), id);
			} else {
				transaction.zAdd(this.indexKey(index.name), { score, value: id });
			}
		}
	}

	private async run<R>(operation: string, task: () => Promise<R>): Promise<R> {
		try {
			return await withTimeout(operation, this.options.timeoutMs, task);
		} catch (error) {
			throw toTransient(operation, error);
		}
	}

	private parse(id: string, payload: string | null): T | null {
		if (!payload) {
			return null;
		}
		try {
			const parsed: unknown = JSON.parse(payload);
			const record = this.options.decode(parsed);
			if (!record) {
				console.error("[redisStore] stored record has an unexpected shape", { key: this.key(id) });
			}
			return record;
		} catch (error) {
			console.error("[redisStore] failed to parse record", { key: this.key(id), error });
			return null;
		}
	}
}
