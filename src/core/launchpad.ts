/**
 * Launchpad web service client
 *
 * Just enough of the REST API to list a person's merge proposals and resolve
 * the linked people, votes, repositories and branches into RawProposal records.
 * Requests are signed with the OAuth 1.0 PLAINTEXT tokens launchpadlib stores
 * in its unencrypted credential file.
 */

import * as crypto from "node:crypto";
import fetch from "cross-fetch";
import { z } from "zod";
import { CredentialsError, LaunchpadRequestError } from "./errors.js";
import { readFileSafe } from "./utils.js";
import type { RawBranch, RawProposal, RawRepository, RawVote, ReviewSource } from "../types/index.js";

// =============================================================================
// Credentials
// =============================================================================

export interface LaunchpadCredentials {
  consumerKey: string;
  consumerSecret: string;
  accessToken: string;
  accessSecret: string;
}

/**
 * Parse launchpadlib's credential file:
 *
 * ```
 * [1]
 * consumer_key = lpshipit
 * consumer_secret =
 * access_token = ...
 * access_secret = ...
 * ```
 */
export function parseCredentials(content: string): LaunchpadCredentials {
  const values = new Map<string, string>();
  for (const line of content.split(/\r?\n/)) {
    const match = /^\s*([a-z_]+)\s*[=:]\s*(.*?)\s*$/.exec(line);
    if (match) values.set(match[1], match[2]);
  }
  const consumerKey = values.get("consumer_key");
  const accessToken = values.get("access_token");
  const accessSecret = values.get("access_secret");
  if (!consumerKey || !accessToken || !accessSecret) {
    throw new CredentialsError("Credential file must define consumer_key, access_token and access_secret");
  }
  return {
    consumerKey,
    consumerSecret: values.get("consumer_secret") ?? "",
    accessToken,
    accessSecret,
  };
}

export function loadCredentials(filePath: string): LaunchpadCredentials {
  const content = readFileSafe(filePath);
  if (content === null) {
    throw new CredentialsError(
      `No Launchpad credentials at ${filePath}. Log in once with launchpadlib to create them.`
    );
  }
  return parseCredentials(content);
}

const percentEncode = (value: string) =>
  encodeURIComponent(value).replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`);

export function authorizationHeader(
  credentials: LaunchpadCredentials,
  stamp: { timestamp: number; nonce: string }
): string {
  const params: Array<[string, string]> = [
    ["oauth_consumer_key", credentials.consumerKey],
    ["oauth_token", credentials.accessToken],
    ["oauth_signature_method", "PLAINTEXT"],
    ["oauth_signature", `${percentEncode(credentials.consumerSecret)}&${percentEncode(credentials.accessSecret)}`],
    ["oauth_timestamp", String(stamp.timestamp)],
    ["oauth_nonce", stamp.nonce],
    ["oauth_version", "1.0"],
  ];
  return (
    'OAuth realm="https://api.launchpad.net/", ' +
    params.map(([key, value]) => `${key}="${percentEncode(value)}"`).join(", ")
  );
}

// =============================================================================
// Response schemas
// =============================================================================

const optionalText = z.string().nullish();

const collectionSchema = z.object({
  entries: z.array(z.unknown()),
  next_collection_link: z.string().nullish(),
});

const proposalEntrySchema = z.object({
  registrant_link: optionalText,
  description: optionalText,
  commit_message: optionalText,
  votes_collection_link: optionalText,
  web_link: z.string(),
  date_created: z
    .string()
    .transform((value) => new Date(value))
    .refine((date) => !Number.isNaN(date.getTime()), "invalid date_created"),
  source_git_repository_link: optionalText,
  target_git_repository_link: optionalText,
  source_git_path: optionalText,
  target_git_path: optionalText,
  source_branch_link: optionalText,
  target_branch_link: optionalText,
});

type ProposalEntry = z.infer<typeof proposalEntrySchema>;

const voteEntrySchema = z.object({
  reviewer_link: optionalText,
  is_pending: z.boolean(),
  comment_link: optionalText,
});

const personSchema = z.object({ name: z.string() });
const commentSchema = z.object({ vote: optionalText });
const gitRepositorySchema = z.object({
  display_name: z.string(),
  git_ssh_url: optionalText,
  git_https_url: optionalText,
});
const branchSchema = z.object({ display_name: z.string() });

// =============================================================================
// Client
// =============================================================================

export interface FetchResponse {
  ok: boolean;
  status: number;
  statusText: string;
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, init?: { headers?: Record<string, string> }) => Promise<FetchResponse>;

export interface LaunchpadClientOptions {
  apiRoot: string;
  credentials?: LaunchpadCredentials;
  fetch?: FetchLike;
  onWarning?: (message: string) => void;
  /** Injected for deterministic signatures */
  stamp?: () => { timestamp: number; nonce: string };
}

const defaultStamp = () => ({
  timestamp: Math.floor(Date.now() / 1000),
  nonce: crypto.randomBytes(8).toString("hex"),
});

export class LaunchpadClient implements ReviewSource {
  private readonly apiRoot: string;
  private readonly credentials?: LaunchpadCredentials;
  private readonly fetchFn: FetchLike;
  private readonly onWarning: (message: string) => void;
  private readonly stamp: () => { timestamp: number; nonce: string };
  private readonly cache = new Map<string, Promise<unknown>>();

  constructor(options: LaunchpadClientOptions) {
    this.apiRoot = options.apiRoot;
    this.credentials = options.credentials;
    this.fetchFn = options.fetch ?? fetch;
    this.onWarning = options.onWarning ?? (() => {});
    this.stamp = options.stamp ?? defaultStamp;
  }

  async me(): Promise<string> {
    const person = personSchema.parse(await this.get(new URL("people/+me", this.apiRoot).toString()));
    return person.name;
  }

  async fetchProposals(owner: string, statuses: readonly string[]): Promise<RawProposal[]> {
    const url = new URL(`~${encodeURIComponent(owner)}`, this.apiRoot);
    url.searchParams.set("ws.op", "getMergeProposals");
    for (const status of statuses) {
      url.searchParams.append("status", status);
    }

    const proposals: RawProposal[] = [];
    for await (const entry of this.collection(url.toString())) {
      const parsed = proposalEntrySchema.safeParse(entry);
      if (!parsed.success) {
        this.onWarning(`Ignoring unreadable merge proposal: ${parsed.error.issues[0]?.message ?? "invalid"}`);
        continue;
      }
      try {
        proposals.push(await this.resolveProposal(parsed.data));
      } catch (error) {
        if (!(error instanceof LaunchpadRequestError || error instanceof z.ZodError)) throw error;
        const reason = error instanceof z.ZodError ? (error.issues[0]?.message ?? "invalid") : error.message;
        this.onWarning(`Ignoring merge proposal ${parsed.data.web_link}: ${reason}`);
      }
    }
    return proposals;
  }

  private async resolveProposal(entry: ProposalEntry): Promise<RawProposal> {
    const [registrant, votes, sourceGitRepository, targetGitRepository, sourceBranch, targetBranch] =
      await Promise.all([
        this.personName(entry.registrant_link),
        this.votes(entry.votes_collection_link),
        this.gitRepository(entry.source_git_repository_link),
        this.gitRepository(entry.target_git_repository_link),
        this.branch(entry.source_branch_link),
        this.branch(entry.target_branch_link),
      ]);

    return {
      registrant,
      description: entry.description ?? null,
      commitMessage: entry.commit_message ?? null,
      votes,
      webLink: entry.web_link,
      dateCreated: entry.date_created,
      sourceGitRepository,
      targetGitRepository,
      sourceGitPath: entry.source_git_path ?? null,
      targetGitPath: entry.target_git_path ?? null,
      sourceBranch,
      targetBranch,
    };
  }

  private async personName(link: string | null | undefined): Promise<string | null> {
    if (!link) return null;
    return personSchema.parse(await this.get(link)).name;
  }

  private async votes(link: string | null | undefined): Promise<RawVote[]> {
    if (!link) return [];
    const votes: RawVote[] = [];
    for await (const entry of this.collection(link)) {
      const vote = voteEntrySchema.parse(entry);
      const comment = vote.comment_link ? commentSchema.parse(await this.get(vote.comment_link)) : null;
      votes.push({
        reviewer: await this.personName(vote.reviewer_link),
        isPending: vote.is_pending,
        vote: comment?.vote ?? null,
      });
    }
    return votes;
  }

  private async gitRepository(link: string | null | undefined): Promise<RawRepository | null> {
    if (!link) return null;
    const repo = gitRepositorySchema.parse(await this.get(link));
    return {
      displayName: repo.display_name,
      cloneUrl: repo.git_ssh_url ?? repo.git_https_url ?? null,
    };
  }

  private async branch(link: string | null | undefined): Promise<RawBranch | null> {
    if (!link) return null;
    return { displayName: branchSchema.parse(await this.get(link)).display_name };
  }

  private async *collection(url: string): AsyncGenerator<unknown> {
    let next: string | null | undefined = url;
    while (next) {
      const page = collectionSchema.parse(await this.get(next));
      yield* page.entries;
      next = page.next_collection_link;
    }
  }

  /** GET a resource once per run */
  private get(url: string): Promise<unknown> {
    const cached = this.cache.get(url);
    if (cached) return cached;
    const request = this.request(url);
    this.cache.set(url, request);
    return request;
  }

  private async request(url: string): Promise<unknown> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.credentials) {
      headers.Authorization = authorizationHeader(this.credentials, this.stamp());
    }
    const response = await this.fetchFn(url, { headers });
    if (!response.ok) {
      throw new LaunchpadRequestError(url, response.status, response.statusText);
    }
    return response.json();
  }
}
