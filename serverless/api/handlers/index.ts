/**
 * Lambda entry points. The service container is built once per runtime and shared by every
 * handler, so caches and the admission gate span all requests served by this instance.
 */
import { loadConfig } from '../../lib/Config';
import ServiceContainer from '../../lib/ServiceContainer';
import { createCaseHandlers } from './cases';
import { createMetaHandlers } from './meta';

const container = new ServiceContainer(loadConfig());

export const { health, info, getStates, getCommissions, maintenance } = createMetaHandlers(
    container.client,
    () => container.sweep(),
    container.config
);

export const {
    searchByCaseNumber,
    searchByComplainant,
    searchByRespondent,
    searchByComplainantAdvocate,
    searchByRespondentAdvocate,
    searchByIndustryType,
    searchByJudge,
} = createCaseHandlers(container.client, container.config);
