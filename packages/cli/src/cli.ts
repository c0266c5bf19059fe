#!/usr/bin/env node
import { buildProgram } from './program.js';

buildProgram().parse();
