/**
 * Resolver module types
 */

import type { CapturedCall } from "../../types/data-model.js";

/**
 * EndpointGroup - captured calls that reduce to the same method name
 */
export interface EndpointGroup {
  name: string;
  calls: CapturedCall[];
  indices: number[]; // capture positions, parallel to calls
}
