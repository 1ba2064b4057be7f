export {
  buildNavTree,
  renderNav,
  renderNavYaml,
  yamlScalar,
  type NavPage,
  type NavSectionEntries,
  type NavTree,
} from './render.js';
export {
  readMkdocs,
  readNavEntries,
  spliceNav,
  updateMkdocsNav,
  type NavUpdateMode,
  type NavUpdateResult,
} from './mkdocs.js';
export { checkNav, isInSync, type NavCheckReport } from './check.js';
