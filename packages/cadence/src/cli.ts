#!/usr/bin/env node
import { createProgram } from './program.js';
import { report } from './session.js';

createProgram().parseAsync().catch(report);
