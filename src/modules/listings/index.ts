export * from './abstracts.parser';
export * from './listing.crawler';
export * from './category.enricher';
export * from './project-skills';
