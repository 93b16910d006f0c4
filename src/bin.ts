#!/usr/bin/env node
import { execute } from './cli/cli';

void execute(process.argv);
