export interface CaseRecord {
    caseNumber: string;
    caseStage: string;
    // YYYY-MM-DD when the portal date could be parsed, otherwise the trimmed portal text
    filingDate: string;
    complainant: string;
    complainantAdvocate: string;
    respondent: string;
    respondentAdvocate: string;
    // Absolute URL, or '' when the row carries no document
    documentLink: string;
}
