import { pino } from 'pino';
import { beforeEach, describe, expect, it, type Mock, vi } from 'vitest';

import { ServiceRequestError } from '../src/errors.js';
import type { AccessTokenProvider } from '../src/interfaces/index.js';
import { ServiceRequestDispatcher } from '../src/services/serviceRequest.service.js';
import { USER_AGENT } from '../src/utils/ltiServiceFetch.js';

import { installFakeFetch, jsonResponse } from './helpers/fakeFetch.js';
import { CLIENT_ID, REGISTRATION } from './helpers/fixtures.js';

const SCOPE = 'https://purl.imsglobal.org/spec/lti-ags/scope/lineitem';

describe('ServiceRequestDispatcher', () => {
  let getAccessToken: Mock<AccessTokenProvider['getAccessToken']>;
  let dispatcher: ServiceRequestDispatcher;

  beforeEach(() => {
    getAccessToken = vi.fn<AccessTokenProvider['getAccessToken']>().mockResolvedValue({
      tokenUrl: REGISTRATION.authTokenUrl,
      clientId: CLIENT_ID,
      scopes: [SCOPE],
      token: 'token-1',
      expiresAt: new Date(Date.now() + 3_600_000),
    });
    dispatcher = new ServiceRequestDispatcher(
      { getAccessToken },
      15_000,
      pino({ level: 'silent' }),
    );
  });

  it('sends the bearer token with JSON defaults', async () => {
    const requests = installFakeFetch(() => jsonResponse({ ok: true }));

    const response = await dispatcher.dispatch({
      scopes: [SCOPE],
      method: 'post',
      url: 'https://platform.example.com/api/items',
      body: '{"label":"Quiz"}',
    });

    expect(await response.json()).toEqual({ ok: true });
    expect(getAccessToken).toHaveBeenCalledWith([SCOPE], undefined);
    const [request] = requests;
    expect(request?.method).toBe('POST');
    expect(request?.headers.get('Authorization')).toBe('Bearer token-1');
    expect(request?.headers.get('Accept')).toBe('application/json');
    expect(request?.headers.get('Content-Type')).toBe('application/json');
    expect(request?.headers.get('User-Agent')).toBe(USER_AGENT);
    expect(await request?.text()).toBe('{"label":"Quiz"}');
  });

  it('sends no content type on GET', async () => {
    const requests = installFakeFetch(() => jsonResponse([]));

    await dispatcher.dispatch({
      scopes: [SCOPE],
      method: 'GET',
      url: new URL('https://platform.example.com/api/items'),
      accept: 'application/vnd.ims.lis.v2.lineitemcontainer+json',
    });

    const [request] = requests;
    expect(request?.headers.get('Content-Type')).toBeNull();
    expect(request?.headers.get('Accept')).toBe(
      'application/vnd.ims.lis.v2.lineitemcontainer+json',
    );
  });

  it('accepts any of several expected statuses', async () => {
    installFakeFetch(() => new Response(null, { status: 204 }));

    const response = await dispatcher.dispatch({
      scopes: [SCOPE],
      method: 'DELETE',
      url: 'https://platform.example.com/api/items/1',
      expectedStatus: [200, 204],
    });

    expect(response.status).toBe(204);
  });

  it('raises ServiceRequestError on an unexpected status', async () => {
    installFakeFetch(() => new Response('missing', { status: 404, statusText: 'Not Found' }));

    const error = await dispatcher
      .dispatch({ scopes: [SCOPE], method: 'GET', url: 'https://platform.example.com/api/x' })
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ServiceRequestError);
    expect(error).toMatchObject({
      status: 404,
      message: 'service request got response status 404 Not Found',
    });
  });

  it('requires at least one scope', async () => {
    await expect(
      dispatcher.dispatch({ scopes: [], method: 'GET', url: 'https://platform.example.com/' }),
    ).rejects.toThrow('[Service] a service request must declare at least one scope');
    expect(getAccessToken).not.toHaveBeenCalled();
  });
});
