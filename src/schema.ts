import { z } from "zod";

const SensorTypeSchema = z.literal("temperature");

/** One entry of the JSON snapshot endpoint. */
const SensorReadingSchema = z.object({
	sensorid: z.string(),
	type: SensorTypeSchema,
	value: z.number()
});

const SnapshotSchema = z.array(SensorReadingSchema);

export type SensorType = z.infer<typeof SensorTypeSchema>;
export type SensorReading = z.infer<typeof SensorReadingSchema>;

/** Parses and validates a body served by the JSON endpoint. */
export function parseSnapshot(json: string): SensorReading[] {
	let parsed: unknown;
	try {
		parsed = JSON.parse(json) as unknown;
	} catch {
		throw new Error("Invalid JSON in snapshot");
	}

	const res = SnapshotSchema.safeParse(parsed);
	if (!res.success) {
		const issues = res.error.issues
			.slice(0, 5)
			.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`)
			.join("; ");
		throw new Error(`Snapshot schema validation failed: ${issues}`);
	}

	return res.data;
}
