export const NEWS = {
  userAgent: "news-wall/1.0 (+https://example.invalid)",
  timeoutSeconds: 15,
  concurrency: 6, // feeds fetched at once per pass
  fetchLimit: 10, // news-fetch default
  signageLimit: 240, // news-wall keeps more; the page shows the newest
  refreshSeconds: 300,
  minRefreshSeconds: 5,
  port: 8080,
  bind: "0.0.0.0",
  feedsFile: "feeds.txt",
};

// Used when no URLs, --feeds-file or feeds.txt are given.
export const DEFAULT_FEEDS: string[] = [
  "https://feeds.bbci.co.uk/news/rss.xml",
  "https://rss.nytimes.com/services/xml/rss/nyt/HomePage.xml",
  "https://www.npr.org/rss/rss.php?id=1001",
  "https://rss.cnn.com/rss/edition.rss",
  "https://www.aljazeera.com/xml/rss/all.xml",
  "https://feeds.skynews.com/feeds/rss/home.xml",
  "https://www.theguardian.com/world/rss",
  "https://www.engadget.com/rss.xml",
  "https://feeds.arstechnica.com/arstechnica/index",
  "https://www.cnbc.com/id/100003114/device/rss/rss.html",
  "https://www.wired.com/feed/rss",
];
