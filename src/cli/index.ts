#!/usr/bin/env node

/**
 * cspan CLI - comment stripping, token dumps and macro call listings
 */

import { processIO } from './io';
import { createProgram } from './program';

createProgram(processIO()).parse(process.argv);
