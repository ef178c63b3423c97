import type { Footprint, Model3D, Xyz } from "@klc/kicad/FootprintModel";
import { OUTDATED_MODEL_PREFIX_RE } from "../constants";
import { Findings, defineRule, isValidName } from "../helpers";

/** Name suffixes that change the footprint but not its 3D body. */
const SUFFIX_RE = /(_ThermalVias|_Pad[0-9.]*x[0-9.]*mm|_HandSolder|_CircularHoles)/g;

const xyzString = (v: Xyz) => `{'x': ${v.x}, 'y': ${v.y}, 'z': ${v.z}}`;
const isUniform = (v: Xyz, n: number) => v.x === n && v.y === n && v.z === n;

function splitModelPath(modelPath: string): { dir: string; file: string; ext: string } {
  let parts = modelPath.split("/");
  if (parts.length <= 1) parts = modelPath.split("\\");
  const fileName = parts[parts.length - 1];
  const dot = fileName.lastIndexOf(".");
  return {
    dir: parts.slice(0, -1).join("/"),
    file: dot >= 0 ? fileName.slice(0, dot) : "",
    ext: dot >= 0 ? fileName.slice(dot + 1) : fileName,
  };
}

function checkModel(fp: Readonly<Footprint>, model: Model3D, prefix: string, out: Findings): void {
  let flagged = false;

  if (!isUniform(model.offset, 0)) {
    out.error(`3D model offset is not ${xyzString({ x: 0, y: 0, z: 0 })}. Found ${xyzString(model.offset)}`);
    flagged = true;
  }
  if (!isUniform(model.rotate, 0)) {
    out.error(`3D model rotation is not ${xyzString({ x: 0, y: 0, z: 0 })}. Found ${xyzString(model.rotate)}`);
    flagged = true;
  }
  if (!isUniform(model.scale, 1)) {
    out.error(`3D model scale is not ${xyzString({ x: 1, y: 1, z: 1 })}. Found ${xyzString(model.scale)}`);
    flagged = true;
  }
  if (model.hide) {
    out.error("3D model is hidden");
    flagged = true;
  }

  let modelPath = model.path;
  const outdated = OUTDATED_MODEL_PREFIX_RE.exec(modelPath);
  if (modelPath.startsWith(prefix)) {
    modelPath = modelPath.slice(prefix.length);
  } else if (outdated) {
    out.error(`Model path starts with outdated prefix '${outdated[1]}/'; it should start with '${prefix}'`);
    modelPath = modelPath.slice(outdated[0].length);
    flagged = true;
  } else {
    out.warning(`Model path should start with '${prefix}'`);
  }

  const { dir, file, ext } = splitModelPath(modelPath);
  if (ext.toLowerCase() !== "step") {
    out.error("Model is incompatible format (must be STEP file)");
    return;
  }

  const expectedDir = `${fp.libName}.3dshapes`;
  if (dir !== expectedDir) {
    out.error(`3D model directory is different from footprint directory (found '${dir}', should be '${expectedDir}')`);
    flagged = true;
  }

  if (file !== fp.name && fp.name.replace(SUFFIX_RE, "") !== file) {
    if (fp.name.includes(file) || file.includes(fp.name)) {
      out.warning(
        `3D model name is different from footprint name (found '${file}', expected '${fp.name}'), but this might be intentional!`
      );
    } else {
      out.warning(`3D model name is different from footprint name (found '${file}', expected '${fp.name}')`);
      flagged = true;
    }
  }

  for (const match of file.matchAll(SUFFIX_RE)) {
    out.warning(`3D model name contains field that does not change 3D representation (found '${match[1]}')`);
    flagged = true;
  }

  if (!isValidName(file)) {
    out.error(`3D model file path '${file}' contains invalid characters as per KLC G1.1`);
    flagged = true;
  }

  if (flagged) out.extra(`3D model path: ${modelPath}`);
}

export const F9_3 = defineRule<Footprint>("footprint", "F9.3", "Footprint 3D model requirements", (fp, out, ctx) => {
  const models = fp.models;
  if (models.length === 0) {
    if (fp.isVirtual) {
      out.warning("Optional 3D model file path missing from the 3D model settings of the virtual footprint");
    } else {
      out.error("3D model file path missing from the 3D model settings of the footprint");
    }
    return;
  }
  if (models.length > 1) {
    out.warning("More than one 3D model file path provided within the 3D model settings of the footprint");
  }
  for (const model of models) checkModel(fp, model, ctx.constants.modelPathPrefix, out);
});
