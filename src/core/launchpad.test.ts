import { describe, it, expect, vi } from "vitest";
import * as os from "node:os";
import * as path from "node:path";
import {
  authorizationHeader,
  LaunchpadClient,
  loadCredentials,
  parseCredentials,
  type FetchLike,
  type LaunchpadCredentials,
} from "./launchpad.js";
import { CredentialsError, LaunchpadRequestError } from "./errors.js";

const ROOT = "https://api.test/devel/";
const PROPOSALS_URL = `${ROOT}~alice?ws.op=getMergeProposals&status=Needs+review&status=Approved`;

const credentials: LaunchpadCredentials = {
  consumerKey: "lpshipit",
  consumerSecret: "",
  accessToken: "test-token",
  accessSecret: "test-secret",
};

function fakeFetch(routes: Record<string, unknown>) {
  const fn = vi.fn<FetchLike>(async (url) => {
    if (!(url in routes)) {
      return { ok: false, status: 404, statusText: "Not Found", json: async () => ({}) };
    }
    return { ok: true, status: 200, statusText: "OK", json: async () => routes[url] };
  });
  return fn;
}

const gitEntry = {
  registrant_link: `${ROOT}~alice`,
  description: "Fix the thing",
  commit_message: null,
  votes_collection_link: `${ROOT}mp/1/votes`,
  web_link: "https://code.test/mp/1",
  date_created: "2024-03-01T10:00:00+00:00",
  source_git_repository_link: `${ROOT}repo/src`,
  target_git_repository_link: `${ROOT}repo/tgt`,
  source_git_path: "refs/heads/feature-x",
  target_git_path: "refs/heads/main",
  source_branch_link: null,
  target_branch_link: null,
};

const routes: Record<string, unknown> = {
  [`${ROOT}people/+me`]: { name: "alice" },
  [PROPOSALS_URL]: {
    entries: [
      gitEntry,
      { description: "no link or date" },
    ],
    next_collection_link: `${ROOT}~alice?page=2`,
  },
  [`${ROOT}~alice?page=2`]: {
    entries: [
      {
        registrant_link: `${ROOT}~alice`,
        description: null,
        commit_message: "Old branch work",
        votes_collection_link: null,
        web_link: "https://code.test/mp/2",
        date_created: "2023-01-01T00:00:00+00:00",
        source_branch_link: `${ROOT}branch/src`,
        target_branch_link: `${ROOT}branch/tgt`,
      },
    ],
  },
  [`${ROOT}~alice`]: { name: "alice" },
  [`${ROOT}~bob`]: { name: "bob" },
  [`${ROOT}~carol`]: { name: "carol" },
  [`${ROOT}mp/1/votes`]: {
    entries: [
      { reviewer_link: `${ROOT}~bob`, is_pending: false, comment_link: `${ROOT}mp/1/comments/1` },
      { reviewer_link: `${ROOT}~carol`, is_pending: true, comment_link: null },
    ],
  },
  [`${ROOT}mp/1/comments/1`]: { vote: "Approve" },
  [`${ROOT}repo/src`]: {
    display_name: "~alice/proj/+git/proj",
    git_ssh_url: "git+ssh://git.test/~alice/proj/+git/proj",
    git_https_url: "https://git.test/~alice/proj/+git/proj",
  },
  [`${ROOT}repo/tgt`]: {
    display_name: "lp:proj",
    git_ssh_url: null,
    git_https_url: "https://git.test/proj",
  },
  [`${ROOT}branch/src`]: { display_name: "lp:~alice/proj/old" },
  [`${ROOT}branch/tgt`]: { display_name: "lp:proj/trunk" },
};

describe("parseCredentials", () => {
  it("reads launchpadlib's credential file", () => {
    const content = "[1]\nconsumer_key = lpshipit\nconsumer_secret = \naccess_token = test-token\naccess_secret = test-secret\n";

    expect(parseCredentials(content)).toEqual(credentials);
  });

  it("rejects a file without tokens", () => {
    expect(() => parseCredentials("[1]\nconsumer_key = lpshipit\n")).toThrow(CredentialsError);
  });

  it("reports a missing file", () => {
    const missing = path.join(os.tmpdir(), "lpshipit-missing", "creds");

    expect(() => loadCredentials(missing)).toThrow(CredentialsError);
  });
});

describe("authorizationHeader", () => {
  it("signs with PLAINTEXT", () => {
    const header = authorizationHeader(credentials, { timestamp: 1700000000, nonce: "abc" });

    expect(header).toBe(
      'OAuth realm="https://api.launchpad.net/", oauth_consumer_key="lpshipit", oauth_token="test-token", ' +
        'oauth_signature_method="PLAINTEXT", oauth_signature="%26test-secret", oauth_timestamp="1700000000", ' +
        'oauth_nonce="abc", oauth_version="1.0"'
    );
  });
});

describe("LaunchpadClient", () => {
  it("resolves the authenticated person", async () => {
    const client = new LaunchpadClient({ apiRoot: ROOT, fetch: fakeFetch(routes) });

    await expect(client.me()).resolves.toBe("alice");
  });

  it("resolves proposals across pages", async () => {
    const onWarning = vi.fn();
    const client = new LaunchpadClient({ apiRoot: ROOT, fetch: fakeFetch(routes), onWarning });

    const proposals = await client.fetchProposals("alice", ["Needs review", "Approved"]);

    expect(proposals).toHaveLength(2);
    expect(proposals[0]).toEqual({
      registrant: "alice",
      description: "Fix the thing",
      commitMessage: null,
      votes: [
        { reviewer: "bob", isPending: false, vote: "Approve" },
        { reviewer: "carol", isPending: true, vote: null },
      ],
      webLink: "https://code.test/mp/1",
      dateCreated: new Date("2024-03-01T10:00:00Z"),
      sourceGitRepository: {
        displayName: "~alice/proj/+git/proj",
        cloneUrl: "git+ssh://git.test/~alice/proj/+git/proj",
      },
      targetGitRepository: { displayName: "lp:proj", cloneUrl: "https://git.test/proj" },
      sourceGitPath: "refs/heads/feature-x",
      targetGitPath: "refs/heads/main",
      sourceBranch: null,
      targetBranch: null,
    });
    expect(proposals[1]).toMatchObject({
      registrant: "alice",
      commitMessage: "Old branch work",
      votes: [],
      sourceGitRepository: null,
      sourceBranch: { displayName: "lp:~alice/proj/old" },
      targetBranch: { displayName: "lp:proj/trunk" },
    });
    expect(onWarning).toHaveBeenCalledTimes(1);
  });

  it("skips a proposal whose linked records cannot be fetched", async () => {
    const onWarning = vi.fn();
    const fetch = fakeFetch({
      ...routes,
      [PROPOSALS_URL]: {
        entries: [
          gitEntry,
          { ...gitEntry, web_link: "https://code.test/mp/3", votes_collection_link: `${ROOT}mp/3/votes` },
        ],
      },
      [`${ROOT}mp/3/votes`]: {
        entries: [{ reviewer_link: `${ROOT}~gone`, is_pending: false, comment_link: null }],
      },
    });
    const client = new LaunchpadClient({ apiRoot: ROOT, fetch, onWarning });

    const proposals = await client.fetchProposals("alice", ["Needs review", "Approved"]);

    expect(proposals.map((mp) => mp.webLink)).toEqual(["https://code.test/mp/1"]);
    expect(onWarning).toHaveBeenCalledWith(
      `Ignoring merge proposal https://code.test/mp/3: Launchpad request failed: 404 Not Found (${ROOT}~gone)`
    );
  });

  it("skips a proposal with an unreadable vote", async () => {
    const onWarning = vi.fn();
    const fetch = fakeFetch({
      ...routes,
      [PROPOSALS_URL]: {
        entries: [
          { ...gitEntry, web_link: "https://code.test/mp/4", votes_collection_link: `${ROOT}mp/4/votes` },
          gitEntry,
        ],
      },
      [`${ROOT}mp/4/votes`]: { entries: [{ reviewer_link: `${ROOT}~bob` }] },
    });
    const client = new LaunchpadClient({ apiRoot: ROOT, fetch, onWarning });

    const proposals = await client.fetchProposals("alice", ["Needs review", "Approved"]);

    expect(proposals.map((mp) => mp.webLink)).toEqual(["https://code.test/mp/1"]);
    expect(onWarning).toHaveBeenCalledWith("Ignoring merge proposal https://code.test/mp/4: Required");
  });

  it("fetches each linked resource once", async () => {
    const fetch = fakeFetch(routes);
    const client = new LaunchpadClient({ apiRoot: ROOT, fetch });

    await client.fetchProposals("alice", ["Needs review", "Approved"]);

    const registrantCalls = fetch.mock.calls.filter(([url]) => url === `${ROOT}~alice`);
    expect(registrantCalls).toHaveLength(1);
  });

  it("signs requests when credentials are given", async () => {
    const fetch = fakeFetch(routes);
    const client = new LaunchpadClient({
      apiRoot: ROOT,
      fetch,
      credentials,
      stamp: () => ({ timestamp: 1, nonce: "n" }),
    });

    await client.me();

    const headers = fetch.mock.calls[0][1]?.headers;
    expect(headers?.Accept).toBe("application/json");
    expect(headers?.Authorization).toBe(authorizationHeader(credentials, { timestamp: 1, nonce: "n" }));
  });

  it("sends no Authorization header anonymously", async () => {
    const fetch = fakeFetch(routes);
    const client = new LaunchpadClient({ apiRoot: ROOT, fetch });

    await client.me();

    expect(fetch.mock.calls[0][1]?.headers?.Authorization).toBeUndefined();
  });

  it("raises on HTTP errors", async () => {
    const client = new LaunchpadClient({ apiRoot: ROOT, fetch: fakeFetch({}) });

    await expect(client.fetchProposals("nobody", ["Approved"])).rejects.toBeInstanceOf(LaunchpadRequestError);
  });
});
