export { AzureRestClient } from "./client.js";
export type { RestClientOptions } from "./client.js";
export type { RestGetter, RestResponse, TokenProvider } from "./types.js";
