import { pathToFileURL } from 'url';
import { registryFromEnv } from './config/loader.js';
import { startHttp, type ContentHandler } from './connectors/http.js';
import { HttpError } from './util/errors.js';

/** POST / answers with the decoded request body, in whatever format the client accepts. */
export const echoHandler: ContentHandler = (content, req, res) => {
  const url = new URL(req.url || '/', 'http://localhost');
  if (url.pathname !== '/') throw new HttpError(404, `no route for ${url.pathname}`, 'NotFound');
  if (req.method !== 'POST') throw new HttpError(405, `method ${req.method} not allowed`, 'MethodNotAllowed');
  content.sendResponse(res, content.getRequestBody());
};

export function main(env: NodeJS.ProcessEnv = process.env) {
  const bind = env.MEDIAKIT_BIND || '127.0.0.1';
  const port = Number(env.MEDIAKIT_HTTP_PORT || 8000);
  const maxBodyBytes = Number(env.MEDIAKIT_MAX_BODY || 1024 * 1024);

  const registry = registryFromEnv(env);
  const types = registry.availableContentTypes.map(t => t.toString()).join(', ');
  console.log(`[Content] types: ${types}; default ${registry.defaultContentType ?? 'none'}`);
  return startHttp(registry, echoHandler, { port, bind, maxBodyBytes, logPath: env.MEDIAKIT_HTTP_LOG });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main();
}
