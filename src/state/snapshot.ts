import type { DeviceId } from "../onewire/devices";
import type { SensorReading, SensorType } from "../schema";

export interface Reading {
	readonly deviceId: DeviceId;
	readonly sensorType: SensorType;
	/** Degrees Celsius. */
	readonly value: number;
}

export type Snapshot = readonly Reading[];

/**
 * Private per-pass buffer. Starts as a copy of the published snapshot so a
 * device that fails this pass keeps its previous reading.
 */
export class SnapshotBuilder {
	private readonly slots: Reading[];
	private readonly index: ReadonlyMap<DeviceId, number>;

	constructor(base: Snapshot, index: ReadonlyMap<DeviceId, number>) {
		this.slots = [...base];
		this.index = index;
	}

	set(deviceId: DeviceId, value: number): void {
		const slot = this.index.get(deviceId);
		if (slot === undefined) {
			throw new Error(`Unknown device '${deviceId}'`);
		}
		const reading: Reading = { deviceId, sensorType: "temperature", value };
		this.slots[slot] = Object.freeze(reading);
	}

	build(): Snapshot {
		return Object.freeze([...this.slots]);
	}
}

/**
 * Last known readings, one per discovered device, in discovery order.
 *
 * The published array is frozen and only ever replaced as a whole, so a
 * reader holding `current()` sees one complete pass.
 */
export class SnapshotStore {
	private published: Snapshot;
	private readonly index: ReadonlyMap<DeviceId, number>;
	private passes = 0;

	private constructor(deviceIds: readonly DeviceId[]) {
		this.index = new Map(deviceIds.map((id, i) => [id, i]));
		if (this.index.size !== deviceIds.length) {
			throw new Error("Device ids must be unique");
		}
		// Devices that never report keep the zero reading
		this.published = Object.freeze(
			deviceIds.map(deviceId => Object.freeze({ deviceId, sensorType: "temperature" as const, value: 0 }))
		);
	}

	/** Created once, right after device discovery. */
	static allocate(deviceIds: readonly DeviceId[]): SnapshotStore {
		return new SnapshotStore(deviceIds);
	}

	get size(): number {
		return this.index.size;
	}

	/** Number of passes published so far. */
	get generation(): number {
		return this.passes;
	}

	current(): Snapshot {
		return this.published;
	}

	beginPass(): SnapshotBuilder {
		return new SnapshotBuilder(this.published, this.index);
	}

	publish(builder: SnapshotBuilder): void {
		this.published = builder.build();
		this.passes++;
	}

	toJSON(): SensorReading[] {
		return toSensorReadings(this.published);
	}
}

export function toSensorReadings(snapshot: Snapshot): SensorReading[] {
	return snapshot.map(r => ({ sensorid: r.deviceId, type: r.sensorType, value: r.value }));
}
