export {
  selectPrimitiveShape,
  createSegmentCollider,
  buildColliderParts,
  toCompoundShape,
  buildCompoundCollider,
} from "./ColliderGenerator.js";
