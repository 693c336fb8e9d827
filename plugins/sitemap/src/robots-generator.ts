/**
 * robots.txt allowing every crawler and naming the sitemap
 */
export function generateRobotsTxt(sitemapUrl: string): string {
  return `User-agent: *
Allow: /

Sitemap: ${sitemapUrl}
`;
}
