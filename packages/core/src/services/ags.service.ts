import type { Logger } from 'pino';
import type { ZodError } from 'zod';

import { MalformedClaimError, ServiceUnsupportedError } from '../errors.js';
import type { Page } from '../interfaces/page.js';
import type { ServiceRequester } from '../interfaces/serviceRequest.js';
import {
  type CreateLineItem,
  CreateLineItemSchema,
  type LineItem,
  type LineItemFilters,
  type LineItems,
  LineItemSchema,
  LineItemsSchema,
  type UpdateLineItem,
  UpdateLineItemSchema,
} from '../schemas/lti13/ags/lineItem.schema.js';
import { type Result, ResultsSchema } from '../schemas/lti13/ags/result.schema.js';
import {
  type ScoreSubmissionInput,
  ScoreSubmissionSchema,
} from '../schemas/lti13/ags/scoreSubmission.schema.js';
import { AGS_ENDPOINT_CLAIM } from '../schemas/lti13/claims/claimNames.js';
import { AgsEndpointClaimSchema } from '../schemas/lti13/claims/serviceClaims.schema.js';
import type { LaunchClaims } from '../schemas/lti13/launchClaims.schema.js';
import { firstIssueMessage } from '../utils/errorFormatting.js';
import { getNextPageUrl } from '../utils/linkHeader.js';
import { readJson } from '../utils/responseParsing.js';
import { appendPath, parseClaimUrl } from '../utils/serviceUrl.js';

export const AGS_SCOPES = {
  lineItem: 'https://purl.imsglobal.org/spec/lti-ags/scope/lineitem',
  lineItemReadOnly: 'https://purl.imsglobal.org/spec/lti-ags/scope/lineitem.readonly',
  resultReadOnly: 'https://purl.imsglobal.org/spec/lti-ags/scope/result.readonly',
  score: 'https://purl.imsglobal.org/spec/lti-ags/scope/score',
} as const;

export const AGS_MEDIA_TYPES = {
  score: 'application/vnd.ims.lis.v1.score+json',
  resultContainer: 'application/vnd.ims.lis.v2.resultcontainer+json',
  lineItem: 'application/vnd.ims.lis.v2.lineitem+json',
  lineItemContainer: 'application/vnd.ims.lis.v2.lineitemcontainer+json',
} as const;

const SERVICE_NAME = 'assignment and grade services';

export interface ResultPageOptions {
  /** Page size the platform should use; 0 or absent leaves it to the platform */
  limit?: number;
  /** Only results of this user */
  userId?: string;
  /** `nextPage` of the previous page; when given, `limit` and `userId` are already part of it */
  cursor?: string;
  signal?: AbortSignal;
}

/**
 * Assignment and Grade Services (AGS) implementation for LTI 1.3.
 * Submits scores and reads results and line items for one launch.
 *
 * Paging is stateless: each page carries the cursor of the next one, so a
 * service instance may be shared between concurrent callers.
 *
 * @see https://www.imsglobal.org/spec/lti-ags/v2p0
 */
export class AGSService {
  constructor(
    private requester: ServiceRequester,
    /** Line item of the launched resource link */
    readonly lineItemUrl: URL,
    /** Line items container of the launch context */
    readonly lineItemsUrl: URL,
    /** Scopes the platform granted the tool for this launch */
    readonly scopes: readonly string[],
    /** Subject of the launch, used when a score names no user */
    private launchUserId: string | undefined,
    private logger: Logger,
  ) {}

  /**
   * Builds the service from the AGS endpoint claim of a launch.
   *
   * @throws {ServiceUnsupportedError} when the claim or one of its fields is absent
   * @throws {MalformedClaimError} when the claim or one of its fields has the wrong type
   */
  static fromClaims(
    requester: ServiceRequester,
    claims: LaunchClaims,
    logger: Logger,
  ): AGSService {
    const claim = claims[AGS_ENDPOINT_CLAIM];
    if (claim === undefined) {
      throw new ServiceUnsupportedError(SERVICE_NAME);
    }
    const result = AgsEndpointClaimSchema.safeParse(claim);
    if (!result.success) {
      throw new MalformedClaimError(
        `${SERVICE_NAME} claim improperly formatted: ${firstIssueMessage(result.error)}`,
        { cause: result.error },
      );
    }
    const { lineitem, lineitems, scope } = result.data;
    if (lineitem === undefined) {
      throw new ServiceUnsupportedError(SERVICE_NAME, 'lineitem URL not found');
    }
    if (lineitems === undefined) {
      throw new ServiceUnsupportedError(SERVICE_NAME, 'lineitems URL not found');
    }
    if (scope === undefined) {
      throw new ServiceUnsupportedError(SERVICE_NAME, 'scopes not found');
    }
    return new AGSService(
      requester,
      parseClaimUrl(lineitem, 'lineitem URL'),
      parseClaimUrl(lineitems, 'lineitems URL'),
      scope,
      claims.sub,
      logger,
    );
  }

  /**
   * Submits a score for the launched line item.
   * The user defaults to the launching user and the timestamp to now.
   *
   * @example
   * ```typescript
   * await ags.putScore({
   *   scoreGiven: 85,
   *   scoreMaximum: 100,
   *   comment: 'Great work!',
   *   activityProgress: 'Completed',
   *   gradingProgress: 'FullyGraded',
   * });
   * ```
   */
  async putScore(score: ScoreSubmissionInput, signal?: AbortSignal): Promise<void> {
    const parsed = ScoreSubmissionSchema.safeParse(score);
    if (!parsed.success) {
      throw new Error(`[AGS] invalid score: ${firstIssueMessage(parsed.error)}`, {
        cause: parsed.error,
      });
    }
    const userId = parsed.data.userId ?? this.launchUserId;
    if (!userId) {
      throw new Error('[AGS] score has no user ID and the launch has no subject');
    }

    const response = await this.requester.serviceRequest({
      scopes: [this.requireScope(AGS_SCOPES.score)],
      method: 'POST',
      url: appendPath(this.lineItemUrl, 'scores'),
      body: JSON.stringify({
        ...parsed.data,
        userId,
        timestamp: parsed.data.timestamp ?? new Date().toISOString(),
      }),
      contentType: AGS_MEDIA_TYPES.score,
      expectedStatus: [200, 204],
      signal,
    });
    await response.body?.cancel();
    this.logger.debug({ lineItem: this.lineItemUrl.href, userId }, 'score submitted');
  }

  /** Every result of the launched line item, across all pages. */
  async getResults(signal?: AbortSignal): Promise<Result[]> {
    return await collect(this.resultPages({ signal }));
  }

  /** Every result of one user on the launched line item. */
  async getUserResults(userId: string, signal?: AbortSignal): Promise<Result[]> {
    if (!userId) {
      throw new Error('[AGS] user ID is required');
    }
    return await collect(this.resultPages({ userId, signal }));
  }

  /**
   * Fetches one page of results. Pass the returned `nextPage` back as
   * `cursor` until `hasMore` is false.
   */
  async getPagedResults(options: ResultPageOptions = {}): Promise<Page<Result>> {
    const url = options.cursor ? new URL(options.cursor) : this.resultsUrl(options);

    const response = await this.requester.serviceRequest({
      scopes: [this.requireScope(AGS_SCOPES.resultReadOnly)],
      method: 'GET',
      url,
      accept: AGS_MEDIA_TYPES.resultContainer,
      signal: options.signal,
    });
    const items = await readJson(response, ResultsSchema, '[AGS] results');
    const next = getNextPageUrl(response.headers.get('Link'), url);
    return { items, hasMore: next !== undefined, nextPage: next?.href };
  }

  /**
   * Walks the result pages in order, yielding the items of each.
   *
   * @example
   * ```typescript
   * for await (const results of ags.resultPages({ limit: 50 })) {
   *   await saveAll(results);
   * }
   * ```
   */
  async *resultPages(options: Omit<ResultPageOptions, 'cursor'> = {}): AsyncGenerator<Result[]> {
    let cursor: string | undefined;
    do {
      const page = await this.getPagedResults({ ...options, cursor });
      yield page.items;
      cursor = page.nextPage;
    } while (cursor !== undefined);
  }

  /**
   * Reads a line item, by default the launched one.
   */
  async getLineItem(targetUrl?: string | URL, signal?: AbortSignal): Promise<LineItem> {
    const response = await this.requester.serviceRequest({
      scopes: [this.requireScope(AGS_SCOPES.lineItemReadOnly, AGS_SCOPES.lineItem)],
      method: 'GET',
      url: targetUrl ?? this.lineItemUrl,
      accept: AGS_MEDIA_TYPES.lineItem,
      signal,
    });
    return await readJson(response, LineItemSchema, '[AGS] line item');
  }

  /**
   * Lists the line items of the launch context, following every page.
   */
  async getLineItems(filters: LineItemFilters = {}, signal?: AbortSignal): Promise<LineItems> {
    const scope = this.requireScope(AGS_SCOPES.lineItemReadOnly, AGS_SCOPES.lineItem);
    const items: LineItems = [];
    let url: URL | undefined = this.lineItemsUrlWith(filters);
    while (url) {
      const response = await this.requester.serviceRequest({
        scopes: [scope],
        method: 'GET',
        url,
        accept: AGS_MEDIA_TYPES.lineItemContainer,
        signal,
      });
      items.push(...(await readJson(response, LineItemsSchema, '[AGS] line items')));
      url = getNextPageUrl(response.headers.get('Link'), url);
    }
    return items;
  }

  /**
   * Creates a line item in the launch context.
   *
   * @returns The line item as stored by the platform, including its `id`
   */
  async createLineItem(item: CreateLineItem, signal?: AbortSignal): Promise<LineItem> {
    const response = await this.requester.serviceRequest({
      scopes: [this.requireScope(AGS_SCOPES.lineItem)],
      method: 'POST',
      url: this.lineItemsUrl,
      body: JSON.stringify(parseLineItem(CreateLineItemSchema.safeParse(item))),
      contentType: AGS_MEDIA_TYPES.lineItem,
      accept: AGS_MEDIA_TYPES.lineItem,
      expectedStatus: [200, 201],
      signal,
    });
    return await readJson(response, LineItemSchema, '[AGS] created line item');
  }

  /**
   * Replaces a line item, by default the launched one.
   */
  async updateLineItem(
    item: UpdateLineItem,
    targetUrl?: string | URL,
    signal?: AbortSignal,
  ): Promise<LineItem> {
    const response = await this.requester.serviceRequest({
      scopes: [this.requireScope(AGS_SCOPES.lineItem)],
      method: 'PUT',
      url: targetUrl ?? this.lineItemUrl,
      body: JSON.stringify(parseLineItem(UpdateLineItemSchema.safeParse(item))),
      contentType: AGS_MEDIA_TYPES.lineItem,
      accept: AGS_MEDIA_TYPES.lineItem,
      signal,
    });
    return await readJson(response, LineItemSchema, '[AGS] updated line item');
  }

  /**
   * Deletes a line item, by default the launched one.
   */
  async deleteLineItem(targetUrl?: string | URL, signal?: AbortSignal): Promise<void> {
    const url = targetUrl ?? this.lineItemUrl;
    const response = await this.requester.serviceRequest({
      scopes: [this.requireScope(AGS_SCOPES.lineItem)],
      method: 'DELETE',
      url,
      expectedStatus: [200, 204],
      signal,
    });
    await response.body?.cancel();
    this.logger.debug({ lineItem: String(url) }, 'line item deleted');
  }

  private resultsUrl({ limit, userId }: ResultPageOptions): URL {
    if (limit !== undefined && limit < 0) {
      throw new Error('[AGS] limit must not be negative');
    }
    const url = appendPath(this.lineItemUrl, 'results');
    if (limit) {
      url.searchParams.set('limit', String(limit));
    }
    if (userId) {
      url.searchParams.set('user_id', userId);
    }
    return url;
  }

  private lineItemsUrlWith(filters: LineItemFilters): URL {
    const url = new URL(this.lineItemsUrl);
    if (filters.resourceLinkId) url.searchParams.set('resource_link_id', filters.resourceLinkId);
    if (filters.resourceId) url.searchParams.set('resource_id', filters.resourceId);
    if (filters.tag) url.searchParams.set('tag', filters.tag);
    if (filters.limit) url.searchParams.set('limit', String(filters.limit));
    return url;
  }

  /** First of `candidates` the platform granted for this launch. */
  private requireScope(...candidates: string[]): string {
    const granted = candidates.find((scope) => this.scopes.includes(scope));
    if (!granted) {
      throw new ServiceUnsupportedError(SERVICE_NAME, `scope ${candidates[0]} not granted`);
    }
    return granted;
  }
}

function parseLineItem<T>(
  result: { success: true; data: T } | { success: false; error: ZodError },
): T {
  if (!result.success) {
    throw new Error(`[AGS] invalid line item: ${firstIssueMessage(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

async function collect<T>(pages: AsyncIterable<T[]>): Promise<T[]> {
  const items: T[] = [];
  for await (const page of pages) {
    items.push(...page);
  }
  return items;
}
