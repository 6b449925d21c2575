#!/usr/bin/env node
import { createCli } from './index';
import { reportError } from './output';

createCli()
	.parseAsync(process.argv)
	.catch((error: unknown) => reportError(error));
