import path from 'path';
import fs from 'fs';
import { HttpMethod, OperationDescriptor } from '../src/types';
import { parseOpenAPIDocument } from '../src/openapi-loader';

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');
export const WIDGETS_SPEC = path.join(FIXTURES_DIR, 'widgets.yaml');

export function loadWidgetsDocument() {
  return parseOpenAPIDocument(fs.readFileSync(WIDGETS_SPEC, 'utf8'), WIDGETS_SPEC);
}

export function operation(method: HttpMethod, path: string, tags: string[] = []): OperationDescriptor {
  return { method, path, tags, parameters: [] };
}

type ErrorClass<T extends Error> = new (...args: never[]) => T;

export function captureError<T extends Error>(fn: () => unknown, type: ErrorClass<T>): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}

export async function captureRejection<T extends Error>(promise: Promise<unknown>, type: ErrorClass<T>): Promise<T> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}
