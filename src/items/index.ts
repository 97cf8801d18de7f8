/**
 * Items Module
 *
 * One ApiItem per documented symbol across a set of packages.
 */

export {
  collectApiItems,
  collectDocEntries,
  functionItem,
  typeItem,
  limitItems,
  type ApiItem,
  type ApiItemKind,
  type DocEntry,
} from './collect.js';
