export { SitemapPlugin, sitemapPlugin, SITEMAP_PATH, ROBOTS_PATH } from "./plugin";
export { generateSitemap, type SitemapEntry } from "./sitemap-generator";
export { generateRobotsTxt } from "./robots-generator";
