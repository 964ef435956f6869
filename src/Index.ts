#!/usr/bin/env node
// src/Index.ts
import { main } from './Cli';

main();
