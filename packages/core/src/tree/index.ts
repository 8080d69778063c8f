export { toTree } from './to-tree.js';
export { fromTree, type TreeContext } from './from-tree.js';
export {
  type TreeValue,
  type TreeObject,
  type TreeTag,
  type ValueTag,
  type ExpressionTag,
  type StructureTag,
  VALUE_TAGS,
  EXPRESSION_TAGS,
  STRUCTURE_TAGS,
  isTreeTag,
} from './tags.js';
