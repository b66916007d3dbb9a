import type { Logger } from 'pino';

import { MalformedClaimError, ServiceUnsupportedError } from '../errors.js';
import type { Page } from '../interfaces/page.js';
import type { ServiceRequester } from '../interfaces/serviceRequest.js';
import { NRPS_CLAIM } from '../schemas/lti13/claims/claimNames.js';
import { NrpsServiceClaimSchema } from '../schemas/lti13/claims/serviceClaims.schema.js';
import type { LaunchClaims } from '../schemas/lti13/launchClaims.schema.js';
import {
  type Context,
  type Member,
  type Membership,
  NRPSContextMembershipResponseSchema,
  type NRPSMemberResponse,
} from '../schemas/lti13/nrps/contextMembership.schema.js';
import { firstIssueMessage } from '../utils/errorFormatting.js';
import { getNextPageUrl } from '../utils/linkHeader.js';
import { readJson } from '../utils/responseParsing.js';
import { parseClaimUrl } from '../utils/serviceUrl.js';

export const NRPS_SCOPE =
  'https://purl.imsglobal.org/spec/lti-nrps/scope/contextmembership.readonly';
export const NRPS_MEDIA_TYPE = 'application/vnd.ims.lti-nrps.v2.membershipcontainer+json';

const SERVICE_NAME = 'names and role provisioning services';

export interface MembershipPage extends Page<Member> {
  context: Context;
}

/** What the launch token itself says about the launching user. */
export type LaunchingMember = Pick<
  Member,
  'userId' | 'email' | 'name' | 'givenName' | 'familyName'
>;

/**
 * Names and Role Provisioning Services (NRPS) implementation for LTI 1.3.
 * Provides methods to retrieve course membership and user information from the platform.
 *
 * @see https://www.imsglobal.org/spec/lti-nrps/v2p0
 */
export class NRPSService {
  constructor(
    private requester: ServiceRequester,
    /** The context memberships URL of the launch */
    readonly membershipUrl: URL,
    private claims: LaunchClaims,
    private logger: Logger,
  ) {}

  /**
   * Builds the service from the names and roles claim of a launch.
   *
   * @throws {ServiceUnsupportedError} when the claim or its memberships URL is absent
   * @throws {MalformedClaimError} when the claim is not an object or the URL is invalid
   */
  static fromClaims(
    requester: ServiceRequester,
    claims: LaunchClaims,
    logger: Logger,
  ): NRPSService {
    const claim = claims[NRPS_CLAIM];
    if (claim === undefined) {
      throw new ServiceUnsupportedError(SERVICE_NAME);
    }
    const result = NrpsServiceClaimSchema.safeParse(claim);
    if (!result.success) {
      throw new MalformedClaimError(
        `${SERVICE_NAME} claim improperly formatted: ${firstIssueMessage(result.error)}`,
        { cause: result.error },
      );
    }
    if (result.data.context_memberships_url === undefined) {
      throw new ServiceUnsupportedError(SERVICE_NAME, 'context memberships URL not found');
    }
    return new NRPSService(
      requester,
      parseClaimUrl(result.data.context_memberships_url, 'context memberships URL'),
      claims,
      logger,
    );
  }

  /**
   * Retrieves the course membership in a single request.
   *
   * @example
   * ```typescript
   * const { context, members } = await nrps.getMembership();
   * console.log(`${context.title}: ${members.length} members`);
   * ```
   */
  async getMembership(signal?: AbortSignal): Promise<Membership> {
    const { membership } = await this.fetchMembership(this.membershipUrl, signal);
    this.logger.debug(
      { contextId: membership.context.id, members: membership.members.length },
      'membership retrieved',
    );
    return membership;
  }

  /**
   * Fetches one page of members. Pass the returned `nextPage` back as
   * `cursor` until `hasMore` is false.
   */
  async getPagedMembership(options: {
    limit: number;
    cursor?: string;
    signal?: AbortSignal;
  }): Promise<MembershipPage> {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new Error('[NRPS] limit must be a positive integer');
    }
    let url: URL;
    if (options.cursor) {
      url = new URL(options.cursor);
    } else {
      url = new URL(this.membershipUrl);
      url.searchParams.set('limit', String(options.limit));
    }
    const { membership, next } = await this.fetchMembership(url, options.signal);
    return {
      items: membership.members,
      context: membership.context,
      hasMore: next !== undefined,
      nextPage: next?.href,
    };
  }

  /** Walks the membership pages in order, yielding the members of each. */
  async *membershipPages(limit: number, signal?: AbortSignal): AsyncGenerator<Member[]> {
    let cursor: string | undefined;
    do {
      const page = await this.getPagedMembership({ limit, cursor, signal });
      yield page.items;
      cursor = page.nextPage;
    } while (cursor !== undefined);
  }

  /**
   * The launching user as described by the launch itself. Roles and status
   * are not part of a launch token, so they are not included.
   */
  getLaunchingMember(): LaunchingMember {
    if (!this.claims.sub) {
      throw new Error('[NRPS] launch has no subject');
    }
    return {
      userId: this.claims.sub,
      email: this.claims.email,
      name: this.claims.name,
      givenName: this.claims.given_name,
      familyName: this.claims.family_name,
    };
  }

  private async fetchMembership(
    url: URL,
    signal: AbortSignal | undefined,
  ): Promise<{ membership: Membership; next?: URL }> {
    const response = await this.requester.serviceRequest({
      scopes: [NRPS_SCOPE],
      method: 'GET',
      url,
      accept: NRPS_MEDIA_TYPE,
      signal,
    });
    const data = await readJson(
      response,
      NRPSContextMembershipResponseSchema,
      '[NRPS] membership',
    );
    return {
      membership: { id: data.id, context: data.context, members: data.members.map(toMember) },
      next: getNextPageUrl(response.headers.get('Link'), url),
    };
  }
}

function toMember(member: NRPSMemberResponse): Member {
  return {
    status: member.status,
    name: member.name,
    picture: member.picture,
    givenName: member.given_name,
    familyName: member.family_name,
    middleName: member.middle_name,
    email: member.email,
    userId: member.user_id,
    lisPersonSourcedId: member.lis_person_sourcedid,
    roles: member.roles,
  };
}
