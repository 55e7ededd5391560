import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type winston from "winston";

import { createLogger } from "../lib/log";

export function silentLogger(): winston.Logger {
	return createLogger({ serviceName: "test", console: false });
}

export function tempDir(prefix = "onewire-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function payload(milli: number, crc: "YES" | "NO" = "YES"): string {
	return [`72 01 4b 46 7f ff 0e 10 57 : crc=57 ${crc}`, `72 01 4b 46 7f ff 0e 10 57 t=${milli}`, ""].join("\n");
}

export function writeDevice(root: string, deviceId: string, contents: string): void {
	fs.mkdirSync(path.join(root, deviceId), { recursive: true });
	fs.writeFileSync(path.join(root, deviceId, "w1_slave"), contents);
}
