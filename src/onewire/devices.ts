import fs from "node:fs/promises";
import type winston from "winston";

import { deviceListError } from "../lib/errors";

export type DeviceId = string;

/** Kernel bus controller entries, e.g. `w1_bus_master1`. */
const BUS_MASTER_MARKER = "w1_bus_master";

export type ReadDir = (dir: string) => Promise<string[]>;

export interface ListDevicesOptions {
	readdir?: ReadDir;
	logger?: winston.Logger;
}

export function isSensorEntry(name: string): boolean {
	return !name.includes(BUS_MASTER_MARKER);
}

/**
 * Enumerates the sensors under `root` once. Order is whatever the
 * directory listing returns and is kept for the whole process lifetime.
 */
export async function listDevices(root: string, opts: ListDevicesOptions = {}): Promise<DeviceId[]> {
	const readdir: ReadDir = opts.readdir ?? (dir => fs.readdir(dir));

	let entries: string[];
	try {
		entries = await readdir(root);
	} catch (err) {
		throw deviceListError(root, err);
	}

	const devices = entries.filter(isSensorEntry);
	for (const deviceId of devices) {
		opts.logger?.info("Device found: %s", deviceId, { deviceId });
	}

	return devices;
}
