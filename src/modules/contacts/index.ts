export * from './contact.queries';
export * from './email-guesser';
export * from './search-result.parser';
export * from './contact.crawler';
