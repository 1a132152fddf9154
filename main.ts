#!/usr/bin/env node
import "dotenv/config";
import { run } from "./cli.js";

run(process.argv.slice(2), process.env).then(
	code => {
		process.exitCode = code;
	},
	(error: unknown) => {
		console.error("weather-ingest crashed", error);
		process.exitCode = 1;
	}
);
