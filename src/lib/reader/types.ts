/**
 * Reader module types - the subset of HAR 1.2 the reader consumes
 */

import type { CapturedCall } from "../../types/data-model.js";

export interface HarNameValue {
  name: string;
  value: string;
}

export interface HarPostData {
  mimeType?: string;
  text?: string;
}

export interface HarContent {
  mimeType?: string;
  text?: string;
  encoding?: string;
}

export interface HarRequest {
  method: string;
  url: string;
  headers?: HarNameValue[];
  queryString?: HarNameValue[];
  postData?: HarPostData;
}

export interface HarResponse {
  status: number;
  content?: HarContent;
}

export interface HarEntry {
  request: HarRequest;
  response: HarResponse;
}

/**
 * Capture source - anything that can hand out captured calls in recorded order
 */
export interface CaptureSource {
  getCalls(): CapturedCall[];
}
