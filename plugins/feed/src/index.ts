export {
  FeedPlugin,
  feedPlugin,
  feedSettingsSchema,
  FEED_PATH,
  type FeedSettings,
} from "./plugin";
export {
  generateRSSFeed,
  type RSSFeedConfig,
  type FeedPost,
} from "./feed-generator";
