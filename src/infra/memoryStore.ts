import {
	evaluateSetAdd,
	findIndex,
	type AtomicStore,
	type Condition,
	type IndexQuery,
	type Mutation,
	type RecordDecoder,
	type RecordIndex,
	type SetField,
	type StoredRecord,
	type WriteOutcome,
} from "./atomicStore";

export type NowFn = () => Date;

/**
 * In-process store for a single worker. Each operation reads, evaluates and
 * writes without yielding to the event loop, which makes it atomic per record.
 * Payloads are kept serialised so callers never share references with the
 * stored state.
 */
export class MemoryAtomicStore<T extends StoredRecord> implements AtomicStore<T> {
	private readonly records = new Map<string, string>();

	constructor(
		private readonly decode: RecordDecoder<T>,
		private readonly clock: NowFn = () => new Date(),
		private readonly indexes: readonly RecordIndex<T>[] = []
	) {}

	async now(): Promise<Date> {
		return this.clock();
	}

	async get(id: string): Promise<T | null> {
		return this.read(id);
	}

	async putIfAbsent(record: T): Promise<boolean> {
		if (this.records.has(record.id)) {
			return false;
		}
		this.records.set(record.id, JSON.stringify(record));
		return true;
	}

	async updateIfCondition(id: string, mutation: Mutation<T>, condition: Condition<T>): Promise<WriteOutcome<T>> {
		const current = this.read(id);
		if (!current) {
			return { status: "missing" };
		}
		if (!condition(current)) {
			return { status: "conflict", current };
		}
		return this.write(id, mutation(current));
	}

	async addToSet(
		id: string,
		field: SetField<T>,
		value: string,
		condition: Condition<T>,
		mutation?: Mutation<T>
	): Promise<WriteOutcome<T>> {
		const current = this.read(id);
		if (!current) {
			return { status: "missing" };
		}
		const evaluation = evaluateSetAdd(current, field, value, condition, mutation);
		if (!evaluation.accepted) {
			return { status: "conflict", current };
		}
		return this.write(id, evaluation.next);
	}

	async deleteIfCondition(id: string, condition: Condition<T>): Promise<WriteOutcome<T>> {
		const current = this.read(id);
		if (!current) {
			return { status: "missing" };
		}
		if (!condition(current)) {
			return { status: "conflict", current };
		}
		this.records.delete(id);
		return { status: "written", record: current };
	}

	async listIndexed(index: string, query: IndexQuery): Promise<T[]> {
		const definition = findIndex(this.indexes, index);
		const entries: { record: T; score: number }[] = [];
		for (const id of this.records.keys()) {
			const record = this.read(id);
			const value = record ? definition.score(record) : null;
			if (record && value !== null && (query.maxScore === undefined || value <= query.maxScore)) {
				entries.push({ record, score: value });
			}
		}
		return entries
			.sort((a, b) => a.score - b.score || a.record.id.localeCompare(b.record.id))
			.slice(0, Math.max(query.limit, 0))
			.map((entry) => entry.record);
	}

	private read(id: string): T | null {
		const payload = this.records.get(id);
		if (payload === undefined) {
			return null;
		}
		const parsed: unknown = JSON.parse(payload);
		return this.decode(parsed);
	}

	private write(id: string, record: T): WriteOutcome<T> {
		this.records.set(id, JSON.stringify(record));
		const stored = this.read(id);
		if (!stored) {
			throw new Error(`Record ${id} could not be decoded after write`);
		}
		return { status: "written", record: stored };
	}
}
