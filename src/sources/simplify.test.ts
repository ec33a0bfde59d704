import { describe, it, expect, vi } from 'vitest';
import { Readable } from 'stream';
import { Response } from 'node-fetch';
import { SimplifySource, isApplicationLink, parseSimplifyTables } from './simplify';
import { FetchError } from '../utils/errors';
import { HttpFetch } from '../utils/http';

const README = `
# Summer Internships

<table>
<thead><tr><th>Company</th><th>Role</th><th>Location</th><th>Application</th><th>Age</th></tr></thead>
<tbody>
<tr>
  <td><strong><a href="https://simplify.jobs/c/Acme">Acme \u{1F525}</a></strong></td>
  <td>Software Engineering Intern</td>
  <td>New York, NY</td>
  <td><a href="https://jobs.acme.example/123"><img alt="Apply"></a> <a href="https://simplify.jobs/p/1">Simplify</a></td>
  <td>0d</td>
</tr>
<tr>
  <td>↳</td>
  <td>Data Science Intern</td>
  <td>Remote in USA</td>
  <td><a href="#top">top</a><a href="https://github.com/example/repo">repo</a><a href="https://jobs.acme.example/456">Apply</a></td>
  <td>1d</td>
</tr>
<tr><td>Globex</td><td>Hardware Intern</td><td>Austin, TX</td><td>\u{1F512}</td><td>2d</td></tr>
<tr><td>↳</td><td>Firmware Intern</td><td>Austin, TX</td><td><a href="https://globex.example/apply">Apply</a></td><td>2d</td></tr>
<tr><td>only</td><td>two</td></tr>
</tbody>
</table>

<table>
<tbody>
<tr><td>↳</td><td>Orphan Intern</td><td>Boston, MA</td><td><a href="https://orphan.example/apply">Apply</a></td></tr>
</tbody>
</table>
`;

describe('parseSimplifyTables', () => {
  it('extracts rows and inherits the company on continuation rows', () => {
    const { jobs, rejected } = parseSimplifyTables(README, 'github.com');

    expect(jobs).toEqual([
      {
        source: 'simplify',
        company: 'Acme \u{1F525}',
        title: 'Software Engineering Intern',
        location: 'New York, NY',
        link: 'https://jobs.acme.example/123',
      },
      {
        source: 'simplify',
        company: 'Acme \u{1F525}',
        title: 'Data Science Intern',
        location: 'Remote in USA',
        link: 'https://jobs.acme.example/456',
      },
      {
        source: 'simplify',
        company: 'Globex',
        title: 'Firmware Intern',
        location: 'Austin, TX',
        link: 'https://globex.example/apply',
      },
    ]);
    // Globex without a link, orphan continuation row
    expect(rejected).toBe(2);
  });

  it('returns nothing for a document without tables', () => {
    expect(parseSimplifyTables('# Nothing here', 'github.com')).toEqual({ jobs: [], rejected: 0 });
  });
});

describe('isApplicationLink', () => {
  it('rejects anchors, relative links and the listing host', () => {
    expect(isApplicationLink('#section', 'github.com')).toBe(false);
    expect(isApplicationLink('/relative/path', 'github.com')).toBe(false);
    expect(isApplicationLink('https://github.com/org/repo', 'github.com')).toBe(false);
    expect(isApplicationLink('https://gist.github.com/x', 'github.com')).toBe(false);
    expect(isApplicationLink(undefined, 'github.com')).toBe(false);
  });

  it('accepts external links', () => {
    expect(isApplicationLink('https://boards.example.com/jobs/1', 'github.com')).toBe(true);
  });
});

describe('SimplifySource', () => {
  const options = {
    url: 'https://raw.example.com/README.md',
    selfHost: 'github.com',
    timeoutMs: 1_000,
    maxAttempts: 3,
    backoffBaseMs: 0,
  };

  it('retries a server error and counts the retry', async () => {
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(new Response('unavailable', { status: 503 }))
      .mockResolvedValueOnce(new Response(README, { status: 200 }));

    const batch = await new SimplifySource({ ...options, fetchFn }).fetchJobs();

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(batch.jobs).toHaveLength(3);
    expect(batch.rejected).toBe(2);
    expect(batch.retries).toBe(1);
  });

  it('downloads the document again when the connection drops mid-body', async () => {
    const dropped = new Readable({
      read() {
        this.destroy(Object.assign(new Error('socket hang up'), { code: 'ECONNRESET' }));
      },
    });
    const fetchFn = vi
      .fn<HttpFetch>()
      .mockResolvedValueOnce(new Response(dropped, { status: 200 }))
      .mockResolvedValueOnce(new Response(README, { status: 200 }));

    const batch = await new SimplifySource({ ...options, fetchFn }).fetchJobs();

    expect(fetchFn).toHaveBeenCalledTimes(2);
    expect(batch.jobs).toHaveLength(3);
    expect(batch.retries).toBe(1);
  });

  it('fails without retrying a client error', async () => {
    const fetchFn = vi.fn<HttpFetch>().mockResolvedValue(new Response('missing', { status: 404 }));

    await expect(new SimplifySource({ ...options, fetchFn }).fetchJobs()).rejects.toMatchObject({
      name: 'FetchError',
      transient: false,
      status: 404,
    });
    expect(fetchFn).toHaveBeenCalledTimes(1);
  });

  it('fails once retries are exhausted', async () => {
    const fetchFn = vi.fn<HttpFetch>().mockImplementation(async () => new Response('busy', { status: 502 }));

    await expect(new SimplifySource({ ...options, fetchFn }).fetchJobs()).rejects.toBeInstanceOf(FetchError);
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });
});
