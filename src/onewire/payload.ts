import path from "node:path";

/** File every w1_therm device directory exposes its last conversion in. */
const PAYLOAD_FILE = "w1_slave";

/**
 * CRC marker followed, possibly on a later line, by the raw temperature in
 * thousandths of a degree Celsius. Greedy, so the last `t=` wins.
 *
 *   72 01 4b 46 7f ff 0e 10 57 : crc=57 YES
 *   72 01 4b 46 7f ff 0e 10 57 t=23125
 */
const PAYLOAD_PATTERN = /YES[\s\S]*t=(-?[0-9]+)/;

export function devicePayloadPath(root: string, deviceId: string): string {
	return path.join(root, deviceId, PAYLOAD_FILE);
}

/**
 * Temperature in degrees Celsius, or null when the payload has no valid
 * CRC marker or no temperature field.
 */
export function parsePayload(text: string): number | null {
	const match = PAYLOAD_PATTERN.exec(text);
	if (!match) {
		return null;
	}

	const milli = Number.parseInt(match[1], 10);
	if (!Number.isFinite(milli)) {
		return null;
	}

	return milli / 1000;
}
