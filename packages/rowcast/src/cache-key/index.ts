export { AnonMap } from "./anon-map";
export { CacheKey, generateCacheKey } from "./cache-key";
export { type CompareMode, type CompareOptions, compareStructure } from "./compare";
export { LruCache } from "./lru-cache";
