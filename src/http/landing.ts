export interface LandingPageLinks {
	telemetryPath: string;
	jsonPath: string;
}

function escapeHtml(value: string): string {
	return value
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;");
}

export function renderLandingPage(links: LandingPageLinks): string {
	const telemetry = escapeHtml(links.telemetryPath);
	const json = escapeHtml(links.jsonPath);

	return [
		"<html>",
		"<head><title>Onewire Exporter</title></head>",
		"<body>",
		"<h1>Onewire Exporter</h1>",
		`<p><a href="${telemetry}">Metrics</a></p>`,
		`<p><a href="${json}">JSON Metrics</a></p>`,
		"</body>",
		"</html>",
		""
	].join("\n");
}
