/**
 * @fileoverview docshelf configuration
 *
 * - `site_config`: workspace resolution, defaults and `docshelf.yml` loading
 * - `schema`: zod schema for `docshelf.yml`
 */

export {
  CONFIG_FILE_NAME,
  DEFAULT_SITE_CONFIG,
  buildSiteConfig,
  dirLabel,
  loadSiteConfig,
  parseConfigFile,
  resolveWorkspace,
  toPosix,
  type LoadSiteConfigOptions,
  type NavSection,
  type SiteConfig,
} from './site_config.js';

export {
  NavSectionSchema,
  SiteConfigFileSchema,
  type NavSectionInput,
  type SiteConfigFile,
} from './schema.js';
