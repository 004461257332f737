import type { ValidationIssue } from '@scriptorium/core';
import { primaryImageService, type Canvas, type Collection, type Manifest } from './models.js';

const MISSING_SERVICE = 'Image resource missing service (IIIF Image API).';

/**
 * Checks what recognition needs from a manifest: at least one canvas, and an
 * Image API service on every canvas. Not a full Presentation 2.1 validator.
 */
export function validateManifest(manifest: Manifest): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (manifest.sequences.length === 0) {
    issues.push({ path: 'sequences', message: 'Missing or empty sequences[].' });
    return issues;
  }

  const seen = new Set<string>();
  let canvasCount = 0;

  manifest.sequences.forEach((sequence, s) => {
    sequence.canvases.forEach((canvas, c) => {
      canvasCount++;
      const at = `sequences[${s}].canvases[${c}]`;

      if (seen.has(canvas['@id'])) {
        issues.push({ path: `${at}.@id`, message: `Duplicate canvas @id: ${canvas['@id']}` });
      }
      seen.add(canvas['@id']);

      if (canvas.images.length === 0) {
        issues.push({ path: `${at}.images`, message: 'Canvas missing images[].' });
        return;
      }
      if (!primaryImageService(canvas)) {
        issues.push({ path: `${at}.images[0].resource.service`, message: MISSING_SERVICE });
      }
    });
  });

  if (canvasCount === 0) {
    issues.push({ path: 'sequences[*].canvases', message: 'No canvases found.' });
  }

  return issues;
}

export function validateCollection(collection: Collection): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  if (collection.manifests.length === 0 && collection.collections.length === 0) {
    issues.push({ path: 'manifests', message: 'Empty manifests[].' });
  }

  collection.manifests.forEach((entry, i) => {
    if (typeof entry['@id'] !== 'string') {
      issues.push({ path: `manifests[${i}].@id`, message: 'Missing @id.' });
    }
  });
  collection.collections.forEach((entry, i) => {
    if (typeof entry['@id'] !== 'string') {
      issues.push({ path: `collections[${i}].@id`, message: 'Missing @id.' });
    }
  });

  return issues;
}

export function validateCanvas(canvas: Canvas): ValidationIssue[] {
  if (canvas.images.length === 0) {
    return [{ path: 'images', message: 'Canvas missing images[].' }];
  }
  if (!primaryImageService(canvas)) {
    return [{ path: 'images[0].resource.service', message: MISSING_SERVICE }];
  }
  return [];
}
