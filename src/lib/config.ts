export const config = {
  dataDir: process.env.DATA_DIR || "data",
  cacheDbPath: process.env.CACHE_DB_PATH || "data/http-cache.db",
  surfGuideBaseUrl: process.env.SURF_GUIDE_BASE_URL || "",
  breakListPages: parseInt(process.env.BREAK_LIST_PAGES || "27", 10),
  scrapeDelayMs: parseInt(process.env.SCRAPE_DELAY_MS || "1000", 10),
  maxConcurrentRequests: parseInt(process.env.MAX_CONCURRENT_REQUESTS || "3", 10),
  countryMappingPath: process.env.COUNTRY_MAPPING_PATH || "",
  countryNameLanguage: process.env.COUNTRY_NAME_LANGUAGE || "en",
  userAgents: [
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.2 Safari/605.1.15",
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36",
  ],
  getRandomUserAgent(): string {
    return this.userAgents[Math.floor(Math.random() * this.userAgents.length)];
  },
};
