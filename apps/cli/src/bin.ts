#!/usr/bin/env node
import { loadEnv } from "./env";
import { main } from "./index";

loadEnv();
void main();
