#!/usr/bin/env -S node --import tsx

import { runCli } from './program.js';
import { handleError } from './utils/error-handler.js';

runCli().catch(handleError);
