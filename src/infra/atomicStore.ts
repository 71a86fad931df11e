export interface StoredRecord {
	id: string;
}

export type Mutation<T> = (current: T) => T;

export type Condition<T> = (current: T) => boolean;

export type WriteOutcome<T> =
	| { status: "written"; record: T }
	| { status: "conflict"; current: T }
	| { status: "missing" };

/** Fields of `T` holding a set of string members. */
export type SetField<T> = keyof T &
	{
		[K in keyof T]-?: T[K] extends string[] ? K : never;
	}[keyof T];

/**
 * A sorted secondary index. A record belongs to the index while `score`
 * returns a number and is listed in ascending score order, ties by id.
 */
export interface RecordIndex<T> {
	name: string;
	score(record: T): number | null;
}

export interface IndexQuery {
	/** Inclusive upper bound on the score. */
	maxScore?: number;
	limit: number;
}

export interface Clock {
	now(): Promise<Date>;
}

/**
 * One collection of records with single-record atomic writes.
 *
 * Every conditional operation evaluates its condition against the record as
 * it exists at write time and either applies the whole mutation or nothing.
 * Infrastructure failures reject with `TransientStoreError`.
 */
export interface AtomicStore<T extends StoredRecord> extends Clock {
	get(id: string): Promise<T | null>;
	putIfAbsent(record: T): Promise<boolean>;
	updateIfCondition(id: string, mutation: Mutation<T>, condition: Condition<T>): Promise<WriteOutcome<T>>;
	/**
	 * Adds `value` to the set held in `field`. The write is rejected as a
	 * conflict when `value` is already a member or `condition` fails; `mutation`
	 * is applied in the same write.
	 */
	addToSet(
		id: string,
		field: SetField<T>,
		value: string,
		condition: Condition<T>,
		mutation?: Mutation<T>
	): Promise<WriteOutcome<T>>;
	deleteIfCondition(id: string, condition: Condition<T>): Promise<WriteOutcome<T>>;
	/** Reads up to `limit` records from a configured index; maintained by every write above. */
	listIndexed(index: string, query: IndexQuery): Promise<T[]>;
}

/** Decodes a stored payload, returning null for records that cannot be read. */
export type RecordDecoder<T> = (raw: unknown) => T | null;

export function readSetMembers<T extends object>(record: T, field: SetField<T>): string[] {
	const members: unknown = record[field];
	if (!Array.isArray(members)) {
		return [];
	}
	return members.filter((member): member is string => typeof member === "string");
}

export function withSetMember<T extends object>(record: T, field: SetField<T>, value: string): T {
	const members = readSetMembers(record, field);
	if (members.includes(value)) {
		return record;
	}
	return { ...record, [field]: [...members, value] };
}

/** Shared evaluation step for adapters implementing `addToSet` on top of read-modify-write. */
export function evaluateSetAdd<T extends object>(
	current: T,
	field: SetField<T>,
	value: string,
	condition: Condition<T>,
	mutation?: Mutation<T>
): { accepted: true; next: T } | { accepted: false } {
	if (readSetMembers(current, field).includes(value) || !condition(current)) {
		return { accepted: false };
	}
	const mutated = mutation ? mutation(current) : current;
	return { accepted: true, next: withSetMember(mutated, field, value) };
}

/** Score for an ISO timestamp, or null when it does not parse. */
export function timestampScore(value: string | null): number | null {
	if (!value) {
		return null;
	}
	const at = Date.parse(value);
	return Number.isNaN(at) ? null : at;
}

export function findIndex<T>(indexes: readonly RecordIndex<T>[], name: string): RecordIndex<T> {
	const index = indexes.find((candidate) => candidate.name === name);
	if (!index) {
		throw new Error(`Unknown index ${name}`);
	}
	return index;
}
