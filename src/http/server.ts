import { createServer, type Server } from "node:http";
import type { Express } from "express";

import { listenError } from "../lib/errors";
import type { ListenAddress } from "../lib/config";

/** Resolves once bound; a bind failure rejects with LISTEN_ERROR. */
export function listen(app: Express, address: ListenAddress, label: string): Promise<Server> {
	const server = createServer(app);

	return new Promise<Server>((resolve, reject) => {
		const onError = (err: Error): void => {
			reject(listenError(label, err));
		};

		server.once("error", onError);
		server.listen(address.port, address.host, () => {
			server.off("error", onError);
			resolve(server);
		});
	});
}

export function boundPort(server: Server): number {
	const addr = server.address();
	if (addr === null || typeof addr === "string") {
		throw new Error("Server is not bound to a TCP port");
	}
	return addr.port;
}

export function close(server: Server): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		server.close(err => (err ? reject(err) : resolve()));
	});
}
