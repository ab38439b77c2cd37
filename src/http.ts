import axios from 'axios';
import type { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { PHOTOS_USER_AGENT } from './config.js';
import type { SessionCredentials } from './types.js';

export type HttpClientOptions = {
  /** 通信処理の差し替え。テストではプロセス内のスタブを渡します。 */
  adapter?: AxiosAdapter;
  userAgent?: string;
};

/**
 * 認証情報の Cookie をすべてのリクエストに付与する axios インスタンスを作ります。
 * 応答の Set-Cookie は同じ Cookie Jar に書き戻します。
 */
export function createHttpClient(credentials: SessionCredentials, options: HttpClientOptions = {}): AxiosInstance {
  const client = axios.create({
    adapter: options.adapter,
    headers: {
      'User-Agent': options.userAgent ?? PHOTOS_USER_AGENT,
    },
    maxContentLength: Infinity,
    maxBodyLength: Infinity,
  });

  client.interceptors.request.use(async config => {
    const url = client.getUri(config);
    const cookie = await credentials.jar.getCookieString(url);
    if (cookie.length > 0) {
      config.headers.set('Cookie', cookie);
    }
    return config;
  });

  const storeCookies = async (response: AxiosResponse) => {
    const setCookie = response.headers['set-cookie'];
    if (!Array.isArray(setCookie)) {
      return;
    }
    const url = client.getUri(response.config);
    for (const header of setCookie) {
      if (typeof header !== 'string') {
        continue;
      }
      await credentials.jar.setCookie(header, url, { ignoreError: true });
    }
  };

  client.interceptors.response.use(
    async response => {
      await storeCookies(response);
      return response;
    },
    async (error: unknown) => {
      // エラー応答で更新された Cookie も保存する
      if (axios.isAxiosError(error) && error.response !== undefined) {
        await storeCookies(error.response);
      }
      throw error;
    },
  );

  return client;
}
