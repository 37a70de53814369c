/**
 * Tests for GenieSpacesClient: configuration and the HTTP transport.
 * `fetch` is replaced with an in-process stub.
 */

import {
  AuthenticationError,
  ConfigurationError,
  GenieSpacesClient,
  GenieSpacesError,
  NotFoundError,
  SpaceClientError,
  TransportError,
  UnexpectedResponseError,
  createLogger,
  resolveClientConfig,
} from '../src/index';

const silent = createLogger({ level: 'silent' });

function jsonResponse(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

describe('resolveClientConfig', () => {
  test('uses explicit options', () => {
    const config = resolveClientConfig({ host: 'https://test.example.com', token: 'test-token' }, {});
    expect(config).toEqual({
      host: 'https://test.example.com',
      token: 'test-token',
      timeout: 30000,
      userAgent: 'genie-spaces-ts/0.1.0',
    });
  });

  test('strips trailing slashes from the host', () => {
    expect(resolveClientConfig({ host: 'https://test.example.com//', token: 't' }, {}).host).toBe(
      'https://test.example.com'
    );
  });

  test('falls back to environment variables', () => {
    const config = resolveClientConfig(
      {},
      {
        DATABRICKS_HOST: 'https://env.example.com',
        DATABRICKS_TOKEN: 'env-token',
        GENIE_TIMEOUT: '5000',
        GENIE_USER_AGENT: 'ci-pipeline',
      }
    );
    expect(config).toEqual({
      host: 'https://env.example.com',
      token: 'env-token',
      timeout: 5000,
      userAgent: 'ci-pipeline',
    });
  });

  test('explicit options win over the environment', () => {
    const config = resolveClientConfig(
      { host: 'https://option.example.com', timeout: 1000 },
      { DATABRICKS_HOST: 'https://env.example.com', DATABRICKS_TOKEN: 'env-token', GENIE_TIMEOUT: '5000' }
    );
    expect(config.host).toBe('https://option.example.com');
    expect(config.timeout).toBe(1000);
  });

  test('missing host raises', () => {
    expect(() => resolveClientConfig({ token: 'test-token' }, {})).toThrow(ConfigurationError);
    expect(() => resolveClientConfig({ token: 'test-token' }, {})).toThrow('host is required');
  });

  test('missing token raises', () => {
    expect(() => resolveClientConfig({ host: 'https://test.example.com' }, {})).toThrow('token is required');
  });

  test('rejects an invalid GENIE_TIMEOUT', () => {
    expect(() =>
      resolveClientConfig({ host: 'https://h', token: 't' }, { GENIE_TIMEOUT: 'soon' })
    ).toThrow(ConfigurationError);
  });
});

describe('GenieSpacesClient', () => {
  let fetchSpy: jest.SpiedFunction<typeof fetch>;
  let client: GenieSpacesClient;

  beforeEach(() => {
    fetchSpy = jest.spyOn(global, 'fetch');
    client = new GenieSpacesClient({ host: 'https://test.example.com/', token: 'test-token', logger: silent });
  });

  afterEach(() => {
    fetchSpy.mockRestore();
  });

  test('exposes its configuration', () => {
    expect(client.host).toBe('https://test.example.com');
    expect(client.timeout).toBe(30000);
  });

  test('export issues an authenticated GET', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse(200, {
        space_id: 'abc',
        title: 'T',
        warehouse_id: 'w1',
        serialized_space: '{"version":1,"config":{"sample_questions":[]}}',
      })
    );

    const space = await client.spaces.export('abc');

    expect(space.title).toBe('T');
    expect(space.getExport().version).toBe(1);
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://test.example.com/api/2.0/genie/spaces/abc?include_serialized_space=true');
    expect(init?.method).toBe('GET');
    expect(init?.body).toBeUndefined();
    expect(init?.headers).toEqual({
      Authorization: 'Bearer test-token',
      Accept: 'application/json',
      'User-Agent': 'genie-spaces-ts/0.1.0',
    });
  });

  test('update sends a JSON body', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(200, { space_id: 'abc', title: 'Renamed' }));

    await client.spaces.update('abc', { title: 'Renamed' });

    const [url, init] = fetchSpy.mock.calls[0];
    expect(url).toBe('https://test.example.com/api/2.0/genie/spaces/abc');
    expect(init?.method).toBe('PATCH');
    expect(init?.body).toBe('{"title":"Renamed"}');
    expect(init?.headers).toMatchObject({ 'Content-Type': 'application/json' });
  });

  test('update with nothing to send never reaches fetch', async () => {
    await expect(client.spaces.update('abc', {})).rejects.toThrow('Nothing to update');
    expect(fetchSpy).not.toHaveBeenCalled();
  });

  test('404 raises NotFoundError', async () => {
    fetchSpy.mockResolvedValueOnce(
      jsonResponse(404, { error_code: 'RESOURCE_DOES_NOT_EXIST', message: 'Space not found' })
    );

    const attempt = client.spaces.export('nonexistent');

    await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
    await expect(attempt).rejects.toMatchObject({
      statusCode: 404,
      errorCode: 'RESOURCE_DOES_NOT_EXIST',
      message: 'Space not found',
    });
  });

  test.each([401, 403])('%i raises AuthenticationError', async (status) => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(status, { message: 'Unauthorized' }));

    await expect(client.spaces.export('abc')).rejects.toBeInstanceOf(AuthenticationError);
  });

  test('other error statuses raise SpaceClientError', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(500, { message: 'Internal error' }));

    const attempt = client.spaces.export('abc');

    await expect(attempt).rejects.toBeInstanceOf(SpaceClientError);
    await expect(attempt).rejects.toThrow('Internal error');
  });

  test('a remote 400 is a SpaceClientError carrying the payload', async () => {
    fetchSpy.mockResolvedValueOnce(jsonResponse(400, { error_code: 'INVALID_PARAMETER_VALUE', message: 'Bad warehouse' }));

    const attempt = client.spaces.update('abc', { warehouseId: 'nope' });

    await expect(attempt).rejects.toMatchObject({
      statusCode: 400,
      payload: { error_code: 'INVALID_PARAMETER_VALUE', message: 'Bad warehouse' },
    });
  });

  test('a non-JSON error body becomes the message', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('Server Error', { status: 502 }));

    const attempt = client.spaces.export('abc');

    await expect(attempt).rejects.toBeInstanceOf(GenieSpacesError);
    await expect(attempt).rejects.toMatchObject({ statusCode: 502, message: 'Server Error' });
  });

  test('a successful non-JSON body raises UnexpectedResponseError', async () => {
    fetchSpy.mockResolvedValueOnce(new Response('OK', { status: 200, headers: { 'content-type': 'text/plain' } }));

    const attempt = client.spaces.export('abc');

    await expect(attempt).rejects.toBeInstanceOf(UnexpectedResponseError);
    await expect(attempt).rejects.toMatchObject({
      message: 'unexpected space response: Expected object, received string',
      payload: 'OK',
    });
  });

  test('network failures raise TransportError', async () => {
    fetchSpy.mockRejectedValueOnce(new TypeError('fetch failed'));

    const attempt = client.spaces.export('abc');

    await expect(attempt).rejects.toBeInstanceOf(TransportError);
    await expect(attempt).rejects.toThrow('fetch failed');
  });

  test('an aborted request reports the timeout', async () => {
    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    fetchSpy.mockRejectedValueOnce(abort);

    await expect(client.spaces.export('abc')).rejects.toThrow('Request timeout after 30000ms');
  });
});
