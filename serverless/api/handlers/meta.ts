import { errorResponse, portalErrorResponse, successResponse } from '../../lib/apiResponse';
import { PortalClient } from '../../lib/CommissionPortalClient';
import { PortalConfig } from '../../lib/Config';
import { MaintenanceReport } from '../../lib/ServiceContainer';
import { Handler } from './types';

export type ServiceInfo = Pick<PortalConfig, 'serviceName' | 'version'>;

export const ENDPOINTS = {
    health: '/health',
    states: '/states',
    commissions: '/commissions/{stateId}',
    caseSearch: {
        byCaseNumber: '/cases/by-case-number',
        byComplainant: '/cases/by-complainant',
        byRespondent: '/cases/by-respondent',
        byComplainantAdvocate: '/cases/by-complainant-advocate',
        byRespondentAdvocate: '/cases/by-respondent-advocate',
        byIndustryType: '/cases/by-industry-type',
        byJudge: '/cases/by-judge',
    },
} as const;

export interface MetaHandlers {
    health: Handler;
    info: Handler;
    getStates: Handler;
    getCommissions: Handler;
    maintenance: Handler;
}

export function createMetaHandlers(
    client: PortalClient,
    sweep: () => MaintenanceReport,
    service: ServiceInfo
): MetaHandlers {
    return {
        // Liveness only; never touches the portal
        health: async () =>
            successResponse({
                status: 'healthy',
                version: service.version,
                service: service.serviceName,
            }),

        info: async () =>
            successResponse({
                message: `Welcome to ${service.serviceName}`,
                version: service.version,
                endpoints: ENDPOINTS,
            }),

        getStates: async () => {
            try {
                const states = await client.fetchStates();
                return successResponse({ states });
            } catch (error) {
                console.error('Error fetching states:', error);
                return portalErrorResponse(error);
            }
        },

        getCommissions: async event => {
            const stateId = event.pathParameters?.stateId?.trim();
            if (!stateId) {
                return errorResponse('Missing stateId', 400);
            }

            try {
                const commissions = await client.fetchCommissions(stateId);
                return successResponse({ commissions, stateId });
            } catch (error) {
                console.error(`Error fetching commissions for state ${stateId}:`, error);
                return portalErrorResponse(error);
            }
        },

        maintenance: async () => {
            const report = sweep();
            console.log(`Cache maintenance removed ${report.removed} expired entries`);
            return successResponse(report);
        },
    };
}
