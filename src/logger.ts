import { stringify } from "safe-stable-stringify";
import * as winston from "winston";
import { createLogger, format, transports } from "winston";

// logger configuration needs no test coverage
/* node:coverage disable */
const logLevels = {
	levels: {
		error: 1,
		warn: 2,
		info: 3,
		debug: 4,
		verbose: 5,
	},
	colors: {
		error: "red",
		warn: "yellow",
		info: "magenta",
		debug: "blue",
		verbose: "gray",
	},
};
winston.addColors(logLevels.colors);

export const logger = createLogger({
	level: "info",
	levels: logLevels.levels,
	defaultMeta: {},
	format: format.combine(
		format.timestamp(),
		format.errors({ stack: true }),
		format.json(),
	),
	transports: [
		new transports.Console({
			// stdout is reserved for generated code
			stderrLevels: Object.keys(logLevels.levels),
			format: format.combine(
				format.colorize(),
				format.printf(({ level, message, label, ...rest }) => {
					// `JSON.stringify` can't deal with `BigInt`
					const stringifiedRest = stringify(rest);

					const prefix = typeof label === "string" ? `${label}/` : "";
					return `${prefix}${level}: ${message} ${stringifiedRest}`;
				}),
			),
		}),
	],
});
/* node:coverage enable */
