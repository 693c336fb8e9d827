export {
  siteConfigSchema,
  authorSchema,
  collectionDefinitionSchema,
  frontMatterDefaultSchema,
  SOCIAL_NETWORKS,
  type SiteConfig,
  type SiteConfigInput,
  type CollectionDefinition,
  type FrontMatterDefault,
  type AuthorInfo,
  type SocialNetwork,
} from "./schema";
export {
  parseConfig,
  loadConfig,
  validateConfig,
  mergeConfig,
  deepFreeze,
  resolveConfigOverrides,
  type ConfigOverrides,
  type ConfigLoadOptions,
} from "./config-loader";
export { PERMALINK_STYLES, expandPermalinkStyle } from "./permalink-styles";
