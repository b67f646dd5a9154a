import type { DemoSuite } from "../types.js";
import { ioSuite } from "./io.js";
import { sortSuite } from "./sort.js";

export const suites: DemoSuite[] = [sortSuite, ioSuite];
