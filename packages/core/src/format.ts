import { storageToWorking } from "./storageFormat";
import type { StorageValue, WorkingValue } from "./types/document";
import { workingToStorage } from "./workingFormat";

/**
 * Turns a stored document into an application value.
 */
export const load = (document: StorageValue): WorkingValue =>
  storageToWorking(document);

/**
 * Turns an application value into a document the storage boundary accepts.
 */
export const store = (value: WorkingValue): StorageValue =>
  workingToStorage(value);
