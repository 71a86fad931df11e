export type RawRecord = Record<string, unknown>;

export function isRawRecord(raw: unknown): raw is RawRecord {
	return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

export function readString(raw: RawRecord, field: string): string | null {
	const value = raw[field];
	return typeof value === "string" ? value : null;
}

/** Missing or malformed counters read as zero. */
export function readCount(raw: RawRecord, field: string): number {
	const value = raw[field];
	return typeof value === "number" && Number.isSafeInteger(value) && value >= 0 ? value : 0;
}

export function readBoolean(raw: RawRecord, field: string): boolean {
	return raw[field] === true;
}

export function readStringSet(raw: RawRecord, field: string): string[] {
	const value = raw[field];
	if (!Array.isArray(value)) {
		return [];
	}
	const members = value.filter((member): member is string => typeof member === "string");
	return [...new Set(members)];
}

export function readOneOf<V extends string>(raw: RawRecord, field: string, allowed: readonly V[]): V | null {
	const value = raw[field];
	return allowed.find((candidate) => candidate === value) ?? null;
}
