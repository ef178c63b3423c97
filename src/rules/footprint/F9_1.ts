import * as path from "path";
import type { Footprint } from "@klc/kicad/FootprintModel";
import { Findings, defineRule, isValidName } from "../helpers";

const ILLEGAL_TAG_CHARS = [",", ";", ":"];
const ILLEGAL_PROPERTIES = ["footprint", "datasheet", "description"];

function checkDocs(fp: Readonly<Footprint>, out: Findings): void {
  const description = fp.descr ?? "";
  if (!description) {
    out.error("Description field is empty - add footprint description");
    return;
  }
  if (!/https?:\/\//.test(description)) {
    out.error("Description field does not contain a URL - add the URL to the datasheet");
  }
  if (/^https?:\/\//.test(description)) {
    out.error("Description contains only a URL - add more description before the URL");
  }
}

function checkTags(fp: Readonly<Footprint>, out: Findings): void {
  const tags = fp.tags ?? "";
  if (!tags) {
    out.error("Keyword field is empty - add keyword tags");
    return;
  }
  if (tags.length < 2) return;
  for (const c of ILLEGAL_TAG_CHARS) {
    if (tags.includes(c)) out.error(`Tags contain illegal character: ('${c}')`);
  }
}

// KiCad 9 writes empty Datasheet and Description properties; only values count
function checkIllegalProperties(fp: Readonly<Footprint>, out: Findings): void {
  for (const name of ILLEGAL_PROPERTIES) {
    const prop = fp.properties.find(p => p.name.toLowerCase() === name);
    if (prop && prop.value) {
      out.error(`The '${name}' field should not be set for a footprint: (have '${prop.value}')`);
    }
  }
}

export const F9_1 = defineRule<Footprint>("footprint", "F9.1", "Footprint meta-data is filled in as appropriate", (fp, out) => {
  if (fp.fileName !== undefined) {
    const expected = path.basename(fp.fileName, path.extname(fp.fileName));
    if (expected !== fp.name) {
      out.error(`footprint name (in file) was '${fp.name}', but expected (from filename) '${expected}'.`);
    }
  }

  const value = fp.value?.value ?? "";
  if (value !== fp.name) out.error(`Value label '${value}' does not match filename '${fp.name}'`);

  checkDocs(fp, out);
  checkTags(fp, out);
  checkIllegalProperties(fp, out);

  if (!isValidName(fp.name)) {
    out.error(`Module name '${fp.name}' contains invalid characters as per KLC 1.7`);
  }
});
