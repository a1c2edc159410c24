import axios from 'axios';
import { HttpClient } from '../../../src/client/lib/client';
import { ClientError } from '../../../src/common/errors/client.error';

// Mock entire axios module
jest.mock('axios');
const mockedAxios = axios as jest.Mocked<typeof axios>;

describe('HttpClient', () => {
  let client: HttpClient;

  beforeEach(() => {
    jest.resetAllMocks();

    // Mock axios.create to return the mocked axios instance
    (mockedAxios.create as jest.Mock).mockReturnValue(mockedAxios);

    client = new HttpClient({
      baseURL: 'http://localhost:8108',
      timeout: 5000,
      maxRetries: 2,
      retryDelay: 10, // Shorter for tests
      headers: { 'X-API-KEY': 'test-api-key' },
    });
  });

  describe('Client Initialization', () => {
    it('should create a client with default options', () => {
      const simpleClient = new HttpClient({ baseURL: 'http://example.com' });

      expect(simpleClient).toBeInstanceOf(HttpClient);
      expect(mockedAxios.create).toHaveBeenCalledWith({
        baseURL: 'http://example.com',
        timeout: 10000,
        headers: {
          'Content-Type': 'application/json',
        },
      });
    });

    it('should create a client with custom options', () => {
      expect(mockedAxios.create).toHaveBeenCalledWith({
        baseURL: 'http://localhost:8108',
        timeout: 5000,
        headers: {
          'Content-Type': 'application/json',
          'X-API-KEY': 'test-api-key',
        },
      });
    });
  });

  describe('HTTP Methods', () => {
    it('should make a GET request', async () => {
      mockedAxios.get.mockResolvedValueOnce({ data: { ok: true } });

      const result = await client.get('/health');

      expect(result).toEqual({ ok: true });
      expect(mockedAxios.get).toHaveBeenCalledWith('/health', undefined);
    });

    it('should make a POST request', async () => {
      mockedAxios.post.mockResolvedValueOnce({ data: { name: 'created' } });

      const result = await client.post('/collections', { name: 'created' });

      expect(result).toEqual({ name: 'created' });
      expect(mockedAxios.post).toHaveBeenCalledWith('/collections', { name: 'created' }, undefined);
    });

    it('should make a PUT request', async () => {
      mockedAxios.put.mockResolvedValueOnce({ data: { name: 'alias' } });

      const result = await client.put('/aliases/alias', { collection_name: 'c' });

      expect(result).toEqual({ name: 'alias' });
      expect(mockedAxios.put).toHaveBeenCalledWith(
        '/aliases/alias',
        { collection_name: 'c' },
        undefined,
      );
    });

    it('should make a DELETE request', async () => {
      mockedAxios.delete.mockResolvedValueOnce({ data: null });

      await client.delete('/collections/old');

      expect(mockedAxios.delete).toHaveBeenCalledWith('/collections/old', undefined);
    });
  });

  describe('Error Handling', () => {
    it('should throw ClientError with the API message for HTTP errors', async () => {
      mockedAxios.get.mockRejectedValueOnce({
        isAxiosError: true,
        message: 'Request failed with status code 404',
        response: { status: 404, data: { message: 'Not Found', error: 'NotFound' } },
      });

      const error = await client.get('/collections/missing').catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ClientError);
      expect(error).toMatchObject({ statusCode: 404, message: 'Not Found', error: 'NotFound' });
      expect(mockedAxios.get).toHaveBeenCalledTimes(1);
    });

    it('should retry on timeouts', async () => {
      mockedAxios.get
        .mockRejectedValueOnce({
          isAxiosError: true,
          code: 'ECONNABORTED',
          message: 'timeout of 5000ms exceeded',
          request: {},
        })
        .mockResolvedValueOnce({ data: { ok: true } });

      const result = await client.get('/health');

      expect(result).toEqual({ ok: true });
      expect(mockedAxios.get).toHaveBeenCalledTimes(2);
    });

    it('should give up on server errors after the configured retries', async () => {
      mockedAxios.get.mockRejectedValue({
        isAxiosError: true,
        message: 'Request failed with status code 500',
        response: { status: 500, statusText: 'Internal Server Error', data: '' },
      });

      await expect(client.get('/collections')).rejects.toMatchObject({
        statusCode: 500,
        message: 'Internal Server Error (500)',
      });
      expect(mockedAxios.get).toHaveBeenCalledTimes(3);
    });

    it('should report requests without response', async () => {
      mockedAxios.get.mockRejectedValueOnce({
        isAxiosError: true,
        code: 'ECONNREFUSED',
        message: 'connect ECONNREFUSED',
        request: {},
      });

      await expect(client.get('/health')).rejects.toMatchObject({
        statusCode: 0,
        message: 'No response received from server',
      });
    });

    it('should wrap unexpected errors', async () => {
      mockedAxios.get.mockRejectedValueOnce(new Error('boom'));

      await expect(client.get('/health')).rejects.toMatchObject({ statusCode: 0, message: 'boom' });
    });
  });
});
