import {describe, expect, it, vi} from 'vitest';

import {createSharingClient, SharingApiError, SharingTransportError} from '../index';

const ORIGIN = 'https://adb-1.azuredatabricks.net';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: {'content-type': 'application/json'}
  });

const createFetchMock = (respond: (url: string, init?: RequestInit) => Promise<Response>) =>
  vi.fn((input: Parameters<typeof fetch>[0], init?: RequestInit) => respond(String(input), init));

const buildClient = (fetchImpl: ReturnType<typeof createFetchMock>) =>
  createSharingClient({
    destination: {origin: ORIGIN},
    credential: {bearer_value: 'test-token'},
    fetchImpl,
    timeoutMs: 1_000
  });

describe('createSharingClient', () => {
  it('sends bearer authenticated requests to the unity catalog API', async () => {
    const fetchImpl = createFetchMock(() =>
      Promise.resolve(jsonResponse({name: 'sales', objects: [{name: 'main.retail.orders', data_object_type: 'TABLE'}]}))
    );

    const share = await buildClient(fetchImpl).getShare('sales');

    expect(share.name).toBe('sales');
    expect(share.objects).toEqual([{name: 'main.retail.orders', data_object_type: 'TABLE'}]);
    expect(fetchImpl).toHaveBeenCalledWith(
      `${ORIGIN}/api/2.1/unity-catalog/shares/sales?include_shared_data=true`,
      expect.objectContaining({
        method: 'GET',
        redirect: 'manual',
        headers: expect.objectContaining({authorization: 'Bearer test-token'})
      })
    );
  });

  it('encodes names in path segments', async () => {
    const fetchImpl = createFetchMock(() => Promise.resolve(jsonResponse({name: 'team a/b'})));

    await buildClient(fetchImpl).getRecipient('team a/b');

    expect(fetchImpl.mock.calls[0]?.[0]).toBe(`${ORIGIN}/api/2.1/unity-catalog/recipients/team%20a%2Fb`);
  });

  it('follows pagination and filters list results by substring', async () => {
    const fetchImpl = createFetchMock(url => {
      if (url.includes('page_token=page-2')) {
        return Promise.resolve(jsonResponse({shares: [{name: 'finance_eu'}, {name: 'ops'}]}));
      }
      return Promise.resolve(
        jsonResponse({shares: [{name: 'sales_eu'}, {name: 'marketing'}], next_page_token: 'page-2'})
      );
    });

    const shares = await buildClient(fetchImpl).listShares({maxResults: 2, prefix: '_eu'});

    expect(shares.map(share => share.name)).toEqual(['sales_eu', 'finance_eu']);
    expect(fetchImpl.mock.calls.map(call => call[0])).toEqual([
      `${ORIGIN}/api/2.1/unity-catalog/shares?max_results=2`,
      `${ORIGIN}/api/2.1/unity-catalog/shares?max_results=2&page_token=page-2`
    ]);
  });

  it('stops paginating when the service repeats a page token', async () => {
    const fetchImpl = createFetchMock(() =>
      Promise.resolve(jsonResponse({recipients: [{name: 'partner'}], next_page_token: 'same'}))
    );

    const recipients = await buildClient(fetchImpl).listRecipients();

    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(recipients.map(recipient => recipient.name)).toEqual(['partner', 'partner']);
  });

  it('returns an empty list when the service omits the collection', async () => {
    const fetchImpl = createFetchMock(() => Promise.resolve(jsonResponse({})));

    await expect(buildClient(fetchImpl).listShares()).resolves.toEqual([]);
    expect(fetchImpl.mock.calls[0]?.[0]).toBe(`${ORIGIN}/api/2.1/unity-catalog/shares?max_results=100`);
  });

  it('serializes request bodies for mutations', async () => {
    const fetchImpl = createFetchMock((_url, init) =>
      Promise.resolve(init?.method === 'PATCH' ? new Response(null, {status: 200}) : jsonResponse({name: 'partner'}))
    );
    const client = buildClient(fetchImpl);

    await client.createRecipient({name: 'partner', authentication_type: 'TOKEN', comment: 'external'});
    await client.updateRecipient('partner', {ip_access_list: {allowed_ip_addresses: ['10.0.0.1']}});
    await client.rotateRecipientToken('partner', {existing_token_expire_in_seconds: 0});

    expect(fetchImpl.mock.calls.map(([url, init]) => [url, init?.method, init?.body])).toEqual([
      [
        `${ORIGIN}/api/2.1/unity-catalog/recipients`,
        'POST',
        '{"name":"partner","authentication_type":"TOKEN","comment":"external"}'
      ],
      [
        `${ORIGIN}/api/2.1/unity-catalog/recipients/partner`,
        'PATCH',
        '{"ip_access_list":{"allowed_ip_addresses":["10.0.0.1"]}}'
      ],
      [
        `${ORIGIN}/api/2.1/unity-catalog/recipients/partner/rotate-token`,
        'POST',
        '{"existing_token_expire_in_seconds":0}'
      ]
    ]);
  });

  it('keeps unknown response fields', async () => {
    const fetchImpl = createFetchMock(() =>
      Promise.resolve(jsonResponse({name: 'partner', region: 'westeurope', cloud: 'azure'}))
    );

    const recipient = await buildClient(fetchImpl).getRecipient('partner');

    expect(recipient).toEqual({name: 'partner', region: 'westeurope', cloud: 'azure'});
  });

  it('raises service errors with the reported error code', async () => {
    const fetchImpl = createFetchMock(() =>
      Promise.resolve(
        jsonResponse({error_code: 'RESOURCE_DOES_NOT_EXIST', message: 'Share sales does not exist.'}, 404)
      )
    );

    const failure = await buildClient(fetchImpl)
      .deleteShare('sales')
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SharingApiError);
    expect(failure).toMatchObject({
      source: 'sharing_api',
      status_code: 404,
      error_code: 'RESOURCE_DOES_NOT_EXIST',
      message: 'Share sales does not exist.'
    });
  });

  it('raises service errors without a JSON body', async () => {
    const fetchImpl = createFetchMock(() => Promise.resolve(new Response('upstream exploded', {status: 503})));

    await expect(buildClient(fetchImpl).getShare('sales')).rejects.toMatchObject({
      source: 'sharing_api',
      status_code: 503,
      message: 'Sharing service responded with status 503'
    });
  });

  it('treats redirects as service errors', async () => {
    const fetchImpl = createFetchMock(() =>
      Promise.resolve(new Response(null, {status: 302, headers: {location: 'https://login.example.test'}}))
    );

    await expect(buildClient(fetchImpl).getShare('sales')).rejects.toMatchObject({status_code: 302});
  });

  it('maps transport failures', async () => {
    const timeout = createFetchMock(() =>
      Promise.reject(Object.assign(new Error('The operation was aborted'), {name: 'TimeoutError'}))
    );
    const network = createFetchMock(() => Promise.reject(new TypeError('fetch failed')));
    const malformed = createFetchMock(() => Promise.resolve(new Response('not json', {status: 200})));
    const invalid = createFetchMock(() => Promise.resolve(jsonResponse({comment: 'missing name'})));

    await expect(buildClient(timeout).getShare('sales')).rejects.toMatchObject({
      source: 'sharing_transport',
      code: 'timeout',
      message: 'Sharing service request timed out after 1000ms'
    });
    await expect(buildClient(network).getShare('sales')).rejects.toMatchObject({code: 'network_error'});
    await expect(buildClient(malformed).getShare('sales')).rejects.toBeInstanceOf(SharingTransportError);
    await expect(buildClient(invalid).getShare('sales')).rejects.toMatchObject({code: 'invalid_response'});
  });
});
