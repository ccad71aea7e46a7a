#!/usr/bin/env -S node --import tsx

import { program } from './cli/index.js';

await program.parseAsync();
