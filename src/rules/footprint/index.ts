import { F5_2 } from "./F5_2";
import { F5_3 } from "./F5_3";
import { F5_4 } from "./F5_4";
import { F6_1 } from "./F6_1";
import { F6_2 } from "./F6_2";
import { F7_1 } from "./F7_1";
import { F9_1 } from "./F9_1";
import { F9_3 } from "./F9_3";
import { G1_7 } from "./G1_7";
import { G1_10 } from "./G1_10";
import { G1_11 } from "./G1_11";

export const FOOTPRINT_RULES = [F5_2, F5_3, F5_4, F6_1, F6_2, F7_1, F9_1, F9_3, G1_7, G1_10, G1_11];
