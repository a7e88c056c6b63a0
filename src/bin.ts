#!/usr/bin/env node
import { createProgram, runImages } from './cli';

createProgram(runImages).parse(process.argv);
