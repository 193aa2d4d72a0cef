// ============================================================================
// Records
// ============================================================================

// A mathematician as fetched from the genealogy service, keyed by MGP id
export interface MathematicianRecord {
  id: number;
  name: string;
  advisors: number[];                       // ascending, deduplicated
  advisorNames: Record<string, string>;     // advisor id -> display name as listed on this record
  university?: string;                      // preferred degree school (see transformer)
  schools: string[];                        // every degree school, in payload order
  country: string;
  advisees: number[];                       // direct advisees as listed by MGP
  reportedDescendantCount: number;          // MGP's own (global) descendant count
}

export type RecordMap = Map<number, MathematicianRecord>;

// On-disk cache layout: id (as string) -> record
export type CacheDocument = Record<string, MathematicianRecord>;

export type FetchMode = 'parallel' | 'sequential';

// ============================================================================
// Analytics
// ============================================================================

export interface RankedAdvisor {
  id: number;
  name: string;
  students: number;
}

export interface RankedUniversity {
  name: string;
  doctorates: number;
}

export interface RankedDescendants {
  id: number;
  name: string;
  descendants: number;
}

export interface ConnectivitySummary {
  vertexCount: number;
  edgeCount: number;
  isolatedCount: number;
  componentCount: number;
  giantComponentSize: number;
  giantComponentShare: number;  // 0..1 of vertexCount
  isGiant: boolean;             // share > 0.5
  topComponentSizes: number[];
}

export interface AnalysisReport {
  generatedAt: string;
  country: string;
  recordCount: number;
  topAdvisors: RankedAdvisor[];
  topUniversities: RankedUniversity[];
  topDescendants: RankedDescendants[];
  mostReportedDescendants: { id: number; name: string; reportedDescendantCount: number } | null;
  withoutAdviseesCount: number;
  connectivity: ConnectivitySummary;
}

// One CSV row per fetched mathematician
export interface ExportRow {
  id: number;
  name: string;
  descendantCount: number;
  directStudentCount: number;
}

// ============================================================================
// API
// ============================================================================

export interface MathematicianDetail {
  record: MathematicianRecord;
  descendantCount: number;
  students: number[];
}

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
}
