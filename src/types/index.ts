export { HttpMethod, parseHttpMethod } from "./common.js";
export type {
  HeaderValue,
  ServiceAccountCredentials,
  SigningCredential,
  SignableRequest,
  SignedUrl,
} from "./common.js";

export { createSignUrlRequest } from "./requests.js";
export type {
  SigningKeyInput,
  SignedUrlOptions,
  SignUrlRequest,
  SignDownloadUrlRequest,
  SignUploadUrlRequest,
} from "./requests.js";
