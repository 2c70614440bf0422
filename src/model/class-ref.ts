/**
 * Class reference helpers ("3-1" = grade 3, class 1)
 */

import type { ClassRef } from '../types/index.js';
import { SchoolConfigurationError } from './errors.js';

export function createClassRef(grade: number, classNumber: number): ClassRef {
  return Object.freeze({ grade, classNumber });
}

export function lookupClassRef(label: string): ClassRef | undefined {
  const match = /^\s*(\d+)\s*-\s*(\d+)\s*$/.exec(label);
  return match ? createClassRef(parseInt(match[1], 10), parseInt(match[2], 10)) : undefined;
}

export function parseClassRef(label: string): ClassRef {
  const classRef = lookupClassRef(label);
  if (!classRef) {
    throw new SchoolConfigurationError(`Invalid class reference: "${label}" (expected "<grade>-<class>")`);
  }
  return classRef;
}

export function classKey(classRef: ClassRef): string {
  return `${classRef.grade}-${classRef.classNumber}`;
}

export const formatClassRef = classKey;

export function sameClass(a: ClassRef, b: ClassRef): boolean {
  return a.grade === b.grade && a.classNumber === b.classNumber;
}

export function compareClassRefs(a: ClassRef, b: ClassRef): number {
  return a.grade - b.grade || a.classNumber - b.classNumber;
}
