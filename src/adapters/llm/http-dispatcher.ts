import { Agent, setGlobalDispatcher } from "undici";
import { HTTP_CLIENT_TIMEOUT_MS } from "../../config/timeouts.js";

// Undici dispatcher shared by every provider SDK (they call fetch)
// - connectTimeout: 3s (fail fast on connection issues)
// - headersTimeout: HTTP_CLIENT_TIMEOUT_MS + 5s
// - bodyTimeout: HTTP_CLIENT_TIMEOUT_MS (central config)
export const httpDispatcher = new Agent({
  connect: {
    timeout: 3000,
  },
  headersTimeout: HTTP_CLIENT_TIMEOUT_MS + 5000,
  bodyTimeout: HTTP_CLIENT_TIMEOUT_MS,
});

setGlobalDispatcher(httpDispatcher);
