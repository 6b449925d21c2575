import winston from 'winston';

const { combine, timestamp, printf, colorize, errors } = winston.format;

const consoleFormat = printf((info) => {
	const { level, message, timestamp: time, context, stack, ...metadata } = info;
	let line = `${String(time)} [${typeof context === 'string' ? context : 'App'}] ${level}: ${String(message)}`;
	if (typeof stack === 'string') {
		line += `\n${stack}`;
	}
	if (Object.keys(metadata).length > 0) {
		line += ` ${JSON.stringify(metadata)}`;
	}
	return line;
});

const logger: winston.Logger = winston.createLogger({
	level: process.env.LOG_LEVEL ?? 'info',
	silent: process.env.LOG_SILENT === 'true',
	format: combine(timestamp({ format: 'YYYY-MM-DDTHH:mm:ss.SSSZ' }), errors({ stack: true })),
	transports: [
		new winston.transports.Console({
			format: combine(colorize(), consoleFormat),
			stderrLevels: ['error', 'warn'],
		}),
	],
	exitOnError: false,
});

/**
 * Creates a child logger labelled with the given component name.
 * @param context The label, e.g. 'JobQueue' or 'ExecutionEngine'
 */
const createContextLogger = (context: string): winston.Logger => {
	return logger.child({ context });
};

export { logger, createContextLogger };
