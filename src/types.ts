import type { FileKind } from './store/files';
import type { JobStatus } from './store/jobs';
import type { ScreeningReport } from './pipeline/screen';

export interface UploadResponse {
    files: { id: string; name: string; kind: FileKind }[];
}

export interface ScreenQueued {
    id: string;
    status: Extract<JobStatus, "queued">;
}

export interface ScreeningResult {
    report: ScreeningReport;
    report_text: string;
}

export interface ProcessingStatus {
    id: string;
    status: Extract<JobStatus, "queued" | "processing">;
}

export interface CompletedStatus {
    id: string;
    status: Extract<JobStatus, "completed">;
    result: ScreeningResult;
}

export interface FailedStatus {
    id: string;
    status: Extract<JobStatus, "failed">;
    error: string;
}

export type ResultResponse = ProcessingStatus | CompletedStatus | FailedStatus;

export interface PreferencesResponse {
    user_id: string;
    name: string;
    preferred_roles: string;
}
