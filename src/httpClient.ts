import * as http from 'http';
import * as https from 'https';

export interface HttpResponse {
  status: number;
  data: string;
}

/**
 * Single GET request; resolves with status and body whatever the status code
 */
export type HttpGet = (url: string) => Promise<HttpResponse>;

/**
 * GET over http or https depending on the URL, no retries and no timeout
 */
export const httpGet: HttpGet = (url) => {
  return new Promise((resolve, reject) => {
    const urlObj = new URL(url);
    const lib = urlObj.protocol === 'https:' ? https : http;

    const options: http.RequestOptions = {
      hostname: urlObj.hostname,
      port: urlObj.port || undefined,
      path: urlObj.pathname + urlObj.search,
      method: 'GET',
      headers: {
        'Accept': 'application/json',
        'Connection': 'close',
      },
    };

    const req = lib.request(options, (res) => {
      let data = '';
      res.setEncoding('utf8');

      res.on('data', (chunk: string) => {
        data += chunk;
      });

      res.on('end', () => {
        resolve({ status: res.statusCode ?? 0, data });
      });

      res.on('error', reject);
    });

    req.on('error', reject);
    req.end();
  });
};
