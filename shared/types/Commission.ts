export interface StateInfo {
    stateText: string;
    stateId: string;
}

export interface CommissionInfo {
    commissionText: string;
    commissionId: string;
    stateId: string; // Parent state
}

export interface ResolvedIds {
    stateId: string;
    commissionId: string;
}
