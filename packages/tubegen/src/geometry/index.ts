/**
 * Geometry Module
 *
 * Tube mesh generation from skeleton strands.
 */

export { miterTangent, computeStrandFrames } from "./FrameTransport.js";
export {
  computeStrandVCoordinates,
  generateTubeMeshData,
  generateTubeGeometryByMaterial,
  toBufferGeometry,
} from "./TubeGeometry.js";
