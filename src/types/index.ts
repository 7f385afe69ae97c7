export * from './fields';
export * from './schema';
export * from './scraping';
