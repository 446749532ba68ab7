/**
 * Contact Crawler Tests
 */

import { ContactCrawler, ContactCrawlerOptions, selectWinners } from '../contact.crawler';
import { buildProfileQuery, searchUrl } from '../contact.queries';
import { listingUrl } from '../../listings/listing.crawler';
import { DatasetRepository } from '../../../lib/dataset/dataset.repository';
import { mergeDataset } from '../../../lib/dataset/dataset.merger';
import { ListingRecord, emptyDataset } from '../../../lib/dataset/dataset.types';
import { MemoryProgressStore } from '../../../lib/progress/memory.progress-store';
import { ProgressStatus } from '../../../lib/progress/progress.types';
import { captchaPage, emptySearchPage, listingPage, redirectLink, searchResultPage } from '../../../__tests__/helpers/fixtures';
import { FakeFetcher, createTempDir, httpError, okPage, readJson, removeTempDir } from '../../../__tests__/helpers/mocks';

function listing(id: number, overrides: Partial<ListingRecord> = {}): ListingRecord {
  return {
    id,
    year: '2021',
    title: 'Moss Recovery After Wildfire',
    category: 'Plant Sciences',
    awards: ['First Award of $5,000'],
    abstractUrl: listingUrl(id),
    ...overrides,
  };
}

const janeEmailQuery = '"Jane Doe" email';
const janeProfileQuery = buildProfileQuery('Jane Doe');
const alexEmailQuery = '"Alex Roe" email';

const janeResults = searchResultPage([
  { href: redirectLink('https://bio.school.edu/people/jdoe'), title: 'Lab members', snippet: 'jane.doe@stanford.edu' },
]);
const janeProfiles = searchResultPage([
  { href: redirectLink('https://www.linkedin.com/in/jane-doe-123'), title: 'Jane Doe | LinkedIn', snippet: 'Student' },
]);

describe('selectWinners', () => {
  const listings = [
    listing(3, { year: '2018' }),
    listing(1, { year: '2022' }),
    listing(2, { awards: [] }),
    listing(4, { year: null }),
  ];

  it('should keep awarded listings in id order', () => {
    expect(selectWinners(listings).map((winner) => winner.id)).toEqual([1, 3, 4]);
  });

  it('should apply the year threshold', () => {
    expect(selectWinners(listings, 2019).map((winner) => winner.id)).toEqual([1]);
  });
});

describe('ContactCrawler', () => {
  let dir: string;
  let repository: DatasetRepository;

  beforeEach(async () => {
    dir = await createTempDir();
    repository = new DatasetRepository(dir);
    await repository.saveListings(
      mergeDataset(emptyDataset(), [
        { kind: 'listing', record: listing(101, { studentName: 'Doe, Jane' }) },
        { kind: 'listing', record: listing(102, { awards: [] }) },
        { kind: 'listing', record: listing(103, { year: '2018', awards: ['Second Award of $2,000'] }) },
      ])
    );
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function setup(fetcher: FakeFetcher, progress = new MemoryProgressStore(), options: ContactCrawlerOptions = {}) {
    const crawler = new ContactCrawler(
      { fetcher, progress, repository },
      {
        ...options,
        config: { sleep: async () => undefined, batchSize: 10, maxRetries: 0, blockThreshold: 2, ...options.config },
      }
    );
    return { crawler, progress };
  }

  function standardFetcher(): FakeFetcher {
    return new FakeFetcher({
      [searchUrl(janeEmailQuery)]: okPage(janeResults),
      [searchUrl(janeProfileQuery)]: okPage(janeProfiles),
      [listingUrl(103)]: okPage(listingPage({ finalists: 'Roe, Alex', awards: 'Second Award of $2,000' })),
      [searchUrl(alexEmailQuery)]: okPage(emptySearchPage),
    });
  }

  it('should search every winner and store the candidates', async () => {
    const fetcher = standardFetcher();
    const { crawler } = setup(fetcher);

    const summary = await crawler.run();

    expect(summary).toMatchObject({ requested: 2, completed: 2, fetched: 2, parsed: 2, failed: 0, skipped: 0 });
    expect(await readJson(repository.filePath('contacts'))).toEqual([
      { owner_id: 101, name: 'Jane Doe', email: 'jane.doe@stanford.edu', source_query: janeEmailQuery },
      { owner_id: 101, name: 'Jane Doe', source_query: janeEmailQuery },
      {
        owner_id: 101,
        name: 'Jane Doe',
        linkedin_url: 'https://www.linkedin.com/in/jane-doe-123',
        source_query: janeProfileQuery,
      },
      { owner_id: 103, name: 'Alex Roe', source_query: alexEmailQuery },
    ]);
    expect(await readJson(repository.filePath('winnerEmails'))).toEqual([
      {
        id: 101,
        name: 'Jane Doe',
        title: 'Moss Recovery After Wildfire',
        year: '2021',
        awards: ['First Award of $5,000'],
        emails: ['jane.doe@stanford.edu'],
        linkedin: ['https://www.linkedin.com/in/jane-doe-123'],
        queries: [janeEmailQuery, janeProfileQuery],
      },
      {
        id: 103,
        name: 'Alex Roe',
        title: 'Moss Recovery After Wildfire',
        year: '2018',
        awards: ['Second Award of $2,000'],
        emails: [],
        linkedin: [],
        queries: [alexEmailQuery],
      },
    ]);
  });

  it('should run three email queries and one profile query per winner', async () => {
    const fetcher = standardFetcher();
    const { crawler } = setup(fetcher);

    await crawler.run({ limit: 1 });

    expect(fetcher.calls).toEqual([
      searchUrl(janeEmailQuery),
      searchUrl('"Jane Doe" contact'),
      searchUrl('"Jane Doe" ISEF email'),
      searchUrl(janeProfileQuery),
    ]);
  });

  it('should refetch the listing for a missing student name', async () => {
    const fetcher = standardFetcher();
    const { crawler } = setup(fetcher);

    await crawler.run();

    expect(fetcher.callsTo(listingUrl(103))).toBe(1);
    expect(crawler.getDataset().listings.get(103)?.studentName).toBe('Roe, Alex');
    const projects = await readJson(repository.filePath('projects'));
    expect(projects).toEqual(
      expect.arrayContaining([expect.objectContaining({ id: 103, student_name: 'Roe, Alex', year: '2018' })])
    );
  });

  it('should only search winners from the minimum year on', async () => {
    const { crawler } = setup(standardFetcher());

    const summary = await crawler.run({ minYear: 2020 });

    expect(summary.requested).toBe(1);
    expect(summary.completed).toBe(1);
  });

  it('should skip winners already searched', async () => {
    const fetcher = standardFetcher();
    const { crawler } = setup(fetcher, new MemoryProgressStore({ '101': ProgressStatus.DONE }));

    const summary = await crawler.run();

    expect(summary.skipped).toBe(1);
    expect(fetcher.calls[0]).toBe(listingUrl(103));
  });

  it('should fail a winner when every search fails', async () => {
    const { crawler, progress } = setup(new FakeFetcher({ [listingUrl(103)]: okPage(listingPage()) }));

    const summary = await crawler.run({ limit: 1 });

    expect(summary).toMatchObject({ failed: 1, fetched: 0, stoppedEarly: false });
    expect(progress.get('101')).toBe(ProgressStatus.FAILED);
  });

  it('should mark a winner without a findable name done', async () => {
    const fetcher = standardFetcher().on(listingUrl(103), okPage(listingPage()));
    const { crawler, progress } = setup(fetcher, new MemoryProgressStore({ '101': ProgressStatus.DONE }));

    const summary = await crawler.run();

    expect(summary).toMatchObject({ empty: 1, parsed: 0 });
    expect(progress.get('103')).toBe(ProgressStatus.DONE);
  });

  it('should stop when the search engine keeps refusing', async () => {
    const fetcher = new FakeFetcher({
      [searchUrl(janeEmailQuery)]: httpError(429),
      [listingUrl(103)]: okPage(listingPage({ finalists: 'Roe, Alex' })),
      [searchUrl(alexEmailQuery)]: httpError(429),
    });
    const { crawler } = setup(fetcher);

    const summary = await crawler.run();

    expect(summary.stoppedEarly).toBe(true);
    expect(summary.failed).toBe(2);
    expect(fetcher.calls).toEqual([searchUrl(janeEmailQuery), listingUrl(103), searchUrl(alexEmailQuery)]);
  });

  it('should keep emails from results that mention captchas', async () => {
    const fetcher = standardFetcher().on(
      searchUrl(janeEmailQuery),
      okPage(
        searchResultPage([
          { href: '/x', title: 'Lab members', snippet: 'jane.doe@stanford.edu builds captcha benchmarks' },
        ])
      )
    );
    const { crawler } = setup(fetcher);

    const summary = await crawler.run({ limit: 1 });

    expect(summary).toMatchObject({ parsed: 1, failed: 0 });
    const emails = (crawler.getDataset().contacts.get(101) ?? []).flatMap((candidate) =>
      candidate.email ? [candidate.email] : []
    );
    expect(emails).toEqual(['jane.doe@stanford.edu']);
  });

  it('should fail a winner whose search returns a challenge page', async () => {
    const challenge = '<html><body><form id="challenge-form"></form></body></html>';
    const fetcher = standardFetcher().on(searchUrl(janeEmailQuery), okPage(challenge));
    const { crawler, progress } = setup(fetcher);

    const summary = await crawler.run({ limit: 1 });

    expect(summary).toMatchObject({ failed: 1, fetched: 1, parsed: 0 });
    expect(progress.get('101')).toBe(ProgressStatus.FAILED);
    expect(fetcher.calls).toEqual([searchUrl(janeEmailQuery)]);
  });

  it('should fail a winner whose listing refetch returns a challenge page', async () => {
    const fetcher = standardFetcher().on(listingUrl(103), okPage(captchaPage));
    const { crawler, progress } = setup(fetcher, new MemoryProgressStore({ '101': ProgressStatus.DONE }));

    const summary = await crawler.run();

    expect(summary).toMatchObject({ failed: 1, empty: 0 });
    expect(progress.get('103')).toBe(ProgressStatus.FAILED);
    expect(fetcher.calls).toEqual([listingUrl(103)]);
  });

  it('should add university guesses when enabled', async () => {
    await repository.saveListings(
      mergeDataset(emptyDataset(), [
        {
          kind: 'listing',
          record: listing(101, { studentName: 'Doe, Jane', awards: ['Full tuition scholarship to Arizona State University'] }),
        },
      ])
    );
    const { crawler } = setup(standardFetcher(), new MemoryProgressStore(), { guessingEnabled: true });

    await crawler.run();

    const emails = (crawler.getDataset().contacts.get(101) ?? []).flatMap((candidate) =>
      candidate.email ? [candidate.email] : []
    );
    expect(emails).toEqual(['jane.doe@stanford.edu', 'jane.doe@asu.edu', 'janedoe@asu.edu']);
  });
});
