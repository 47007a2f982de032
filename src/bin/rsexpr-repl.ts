#!/usr/bin/env node
import { startRepl } from "../repl";

startRepl();
