#!/usr/bin/env node
import { createCli } from './program.js';

createCli().parse();
