/**
 * Deep readonly utility type that makes all nested properties readonly.
 */
export type DeepReadonly<T> = {
	readonly [P in keyof T]: T[P] extends object ? DeepReadonly<T[P]> : T[P];
};

/**
 * JSON-compatible value, as produced by the YAML/JSON loaders.
 */
export type JsonValue =
	| string
	| number
	| boolean
	| null
	| JsonValue[]
	| { [key: string]: JsonValue };

/**
 * Narrow an unknown value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow an unknown value to a JSON-compatible value.
 */
export function isJsonValue(value: unknown): value is JsonValue {
	if (value === null) return true;
	switch (typeof value) {
		case "string":
		case "number":
		case "boolean":
			return true;
		case "object":
			if (Array.isArray(value)) return value.every(isJsonValue);
			return Object.values(value).every(isJsonValue);
		default:
			return false;
	}
}
