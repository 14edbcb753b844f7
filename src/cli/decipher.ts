#!/usr/bin/env node
import { runCipher } from "./run-cipher.js";

process.exitCode = await runCipher(process.argv.slice(1), "decipher");
