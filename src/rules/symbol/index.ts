import { EC01 } from "./EC01";
import { EC02 } from "./EC02";
import { G1_10 } from "./G1_10";
import { G1_11 } from "./G1_11";
import { S3_1 } from "./S3_1";
import { S4_1 } from "./S4_1";
import { S4_2 } from "./S4_2";
import { S4_4 } from "./S4_4";
import { S4_5 } from "./S4_5";
import { S4_6 } from "./S4_6";
import { S5_2 } from "./S5_2";
import { S6_1 } from "./S6_1";
import { S6_2 } from "./S6_2";

export const SYMBOL_RULES = [EC01, EC02, G1_10, G1_11, S3_1, S4_1, S4_2, S4_4, S4_5, S4_6, S5_2, S6_1, S6_2];
