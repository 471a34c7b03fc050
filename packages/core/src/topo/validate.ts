/**
 * Half-edge mesh validation
 *
 * Walks every live record and reports broken invariants instead of throwing:
 * - Structural issues (dangling handles, cycles that never close)
 * - Link symmetry (twin, next/prev, origin/destination agreement)
 * - Face membership (a cycle carrying two faces)
 * - Duplicate undirected edges
 * - Isolated vertices (warning only)
 */

import type { HalfEdgeMesh } from './HalfEdgeMesh.js';
import type { VertexHandle, HalfEdgeHandle, FaceHandle } from './handles.js';

/**
 * Types of validation issues
 */
export type ValidationIssueKind =
  | 'danglingReference'
  | 'twinMismatch'
  | 'selfTwin'
  | 'twinDirectionMismatch'
  | 'nextPrevMismatch'
  | 'faceCycleMismatch'
  | 'cycleNotClosed'
  | 'outgoingMismatch'
  | 'duplicateEdge'
  | 'isolatedVertex';

export type ValidationSeverity = 'error' | 'warning';

export interface ValidationEntityRef {
  type: 'vertex' | 'halfEdge' | 'face';
  id: number;
}

export interface ValidationIssue {
  kind: ValidationIssueKind;
  severity: ValidationSeverity;
  /** Human-readable description */
  message: string;
  /** The entity where the issue was found */
  entity: ValidationEntityRef;
  related?: ValidationEntityRef[];
}

export interface ValidationReport {
  /** No errors (warnings allowed) */
  isValid: boolean;
  issues: ValidationIssue[];
  errorCount: number;
  warningCount: number;
}

function createReport(): ValidationReport {
  return {
    isValid: true,
    issues: [],
    errorCount: 0,
    warningCount: 0,
  };
}

function addIssue(
  report: ValidationReport,
  kind: ValidationIssueKind,
  severity: ValidationSeverity,
  message: string,
  entity: ValidationEntityRef,
  related?: ValidationEntityRef[]
): void {
  report.issues.push({ kind, severity, message, entity, ...(related ? { related } : {}) });

  if (severity === 'error') {
    report.errorCount++;
    report.isValid = false;
  } else {
    report.warningCount++;
  }
}

const halfEdgeRef = (id: HalfEdgeHandle): ValidationEntityRef => ({ type: 'halfEdge', id });
const vertexRef = (id: VertexHandle): ValidationEntityRef => ({ type: 'vertex', id });
const faceRef = (id: FaceHandle): ValidationEntityRef => ({ type: 'face', id });

/**
 * Validate the complete mesh
 */
export function validateMesh<P>(mesh: HalfEdgeMesh<P>): ValidationReport {
  const report = createReport();

  validateHalfEdges(mesh, report);
  validateFaces(mesh, report);
  validateVertices(mesh, report);
  validateEdgeUniqueness(mesh, report);

  return report;
}

export function isValidMesh<P>(mesh: HalfEdgeMesh<P>): boolean {
  return validateMesh(mesh).isValid;
}

function validateHalfEdges<P>(mesh: HalfEdgeMesh<P>, report: ValidationReport): void {
  const he = mesh.halfEdges;

  for (const h of he.handles()) {
    const record = he.get(h);

    if (!mesh.vertices.has(record.origin)) {
      addIssue(report, 'danglingReference', 'error', `Half-edge ${h} has a dangling origin ${record.origin}`, halfEdgeRef(h), [
        vertexRef(record.origin),
      ]);
    }
    if (record.face !== null && !mesh.faces.has(record.face)) {
      addIssue(report, 'danglingReference', 'error', `Half-edge ${h} lies on deleted face ${record.face}`, halfEdgeRef(h), [
        faceRef(record.face),
      ]);
    }

    const twin = he.tryGet(record.twin);
    const next = he.tryGet(record.next);
    const prev = he.tryGet(record.prev);
    if (!twin || !next || !prev) {
      addIssue(report, 'danglingReference', 'error', `Half-edge ${h} links to a deleted half-edge`, halfEdgeRef(h));
      continue;
    }

    if (record.twin === h) {
      addIssue(report, 'selfTwin', 'error', `Half-edge ${h} is its own twin`, halfEdgeRef(h));
    } else if (twin.twin !== h) {
      addIssue(report, 'twinMismatch', 'error', `twin(twin(${h})) is ${twin.twin}`, halfEdgeRef(h), [
        halfEdgeRef(record.twin),
      ]);
    }
    if (twin.origin !== next.origin) {
      addIssue(
        report,
        'twinDirectionMismatch',
        'error',
        `Half-edge ${h} ends at ${next.origin} but its twin starts at ${twin.origin}`,
        halfEdgeRef(h),
        [halfEdgeRef(record.twin)]
      );
    }
    if (next.prev !== h || prev.next !== h) {
      addIssue(report, 'nextPrevMismatch', 'error', `next/prev links around half-edge ${h} disagree`, halfEdgeRef(h), [
        halfEdgeRef(record.next),
        halfEdgeRef(record.prev),
      ]);
    }
    if (next.face !== record.face) {
      addIssue(
        report,
        'faceCycleMismatch',
        'error',
        `Half-edge ${h} and its successor ${record.next} lie on different faces`,
        halfEdgeRef(h),
        [halfEdgeRef(record.next)]
      );
    }
  }
}

function validateFaces<P>(mesh: HalfEdgeMesh<P>, report: ValidationReport): void {
  const he = mesh.halfEdges;
  const bound = mesh.config.maxFaceDegree;

  for (const f of mesh.faces.handles()) {
    const start = mesh.faces.get(f).halfEdge;
    if (!he.has(start)) {
      addIssue(report, 'danglingReference', 'error', `Face ${f} starts at deleted half-edge ${start}`, faceRef(f));
      continue;
    }

    let h = start;
    let closed = false;
    for (let steps = 0; steps < bound; steps++) {
      const record = he.tryGet(h);
      if (!record) break;
      if (record.face !== f) {
        addIssue(report, 'faceCycleMismatch', 'error', `Cycle of face ${f} passes half-edge ${h} of another face`, faceRef(f), [
          halfEdgeRef(h),
        ]);
        break;
      }
      h = record.next;
      if (h === start) {
        closed = true;
        break;
      }
    }
    if (!closed) {
      addIssue(report, 'cycleNotClosed', 'error', `Cycle of face ${f} does not return to its start`, faceRef(f));
    }
  }
}

function validateVertices<P>(mesh: HalfEdgeMesh<P>, report: ValidationReport): void {
  for (const v of mesh.vertices.handles()) {
    const outgoing = mesh.vertices.get(v).outgoing;
    if (outgoing === null) {
      addIssue(report, 'isolatedVertex', 'warning', `Vertex ${v} has no incident edges`, vertexRef(v));
      continue;
    }
    const record = mesh.halfEdges.tryGet(outgoing);
    if (!record) {
      addIssue(report, 'danglingReference', 'error', `Vertex ${v} points at deleted half-edge ${outgoing}`, vertexRef(v));
    } else if (record.origin !== v) {
      addIssue(report, 'outgoingMismatch', 'error', `Outgoing half-edge ${outgoing} of vertex ${v} starts at ${record.origin}`, vertexRef(v), [
        halfEdgeRef(outgoing),
      ]);
    }
  }
}

/**
 * Two half-edges between the same vertices must be mutual twins
 */
function validateEdgeUniqueness<P>(mesh: HalfEdgeMesh<P>, report: ValidationReport): void {
  const he = mesh.halfEdges;
  const seen = new Map<string, HalfEdgeHandle>();

  for (const h of he.handles()) {
    const record = he.get(h);
    const next = he.tryGet(record.next);
    if (!next) continue;
    const key = `${record.origin}:${next.origin}`;
    const earlier = seen.get(key);
    if (earlier !== undefined) {
      addIssue(
        report,
        'duplicateEdge',
        'error',
        `Half-edges ${earlier} and ${h} both run ${record.origin} -> ${next.origin}`,
        halfEdgeRef(h),
        [halfEdgeRef(earlier)]
      );
    } else {
      seen.set(key, h);
    }
  }
}
