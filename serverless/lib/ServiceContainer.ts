/**
 * Composition root. Builds every service once from a config and owns their lifecycle;
 * nothing else in the codebase constructs shared state.
 */
import { CommissionInfo, StateInfo } from '../../shared/types';
import AdmissionGate from './AdmissionGate';
import AlertService, { AlertCategory } from './AlertService';
import CaseSearchProcessor from './CaseSearchProcessor';
import CommissionPortalClient from './CommissionPortalClient';
import { PortalConfig } from './Config';
import IdentityResolver from './IdentityResolver';
import PortalDirectory from './PortalDirectory';
import ResilientTransport, { TransportDependencies } from './ResilientTransport';
import TtlCache, { CacheStats } from './TtlCache';

export interface GateStats {
    limit: number;
    active: number;
    waiting: number;
}

export interface MaintenanceReport {
    removed: number;
    states: CacheStats;
    commissions: CacheStats;
    gate: GateStats;
}

export type ContainerOverrides = Partial<Pick<TransportDependencies, 'client' | 'sleep' | 'random' | 'now'>> & {
    alertService?: AlertService;
};

export class ServiceContainer {
    readonly alertService: AlertService;
    readonly gate: AdmissionGate;
    readonly transport: ResilientTransport;
    readonly statesCache: TtlCache<StateInfo[]>;
    readonly commissionsCache: TtlCache<CommissionInfo[]>;
    readonly directory: PortalDirectory;
    readonly resolver: IdentityResolver;
    readonly processor: CaseSearchProcessor;
    readonly client: CommissionPortalClient;

    constructor(
        readonly config: PortalConfig,
        overrides: ContainerOverrides = {}
    ) {
        this.alertService =
            overrides.alertService ?? new AlertService({ stage: config.stage, alertTopicArn: config.alertTopicArn });

        this.gate = new AdmissionGate(config.concurrencyLimit);
        this.transport = new ResilientTransport(config, {
            gate: this.gate,
            logger: this.alertService.forCategory(AlertCategory.NETWORK),
            client: overrides.client,
            sleep: overrides.sleep,
            random: overrides.random,
            now: overrides.now,
        });

        this.statesCache = new TtlCache<StateInfo[]>({ name: 'states', debug: config.debug, now: overrides.now });
        this.commissionsCache = new TtlCache<CommissionInfo[]>({
            name: 'commissions',
            debug: config.debug,
            now: overrides.now,
        });

        const portalLogger = this.alertService.forCategory(AlertCategory.PORTAL);
        this.directory = new PortalDirectory(
            this.transport,
            { states: this.statesCache, commissions: this.commissionsCache },
            config,
            this.alertService.forCategory(AlertCategory.CACHE)
        );
        this.resolver = new IdentityResolver(this.directory, portalLogger);
        this.processor = new CaseSearchProcessor(
            this.resolver,
            this.transport,
            config.baseUrl,
            portalLogger,
            this.alertService.forCategory(AlertCategory.PARSING)
        );
        this.client = new CommissionPortalClient(this.directory, this.resolver, this.processor);
    }

    /**
     * Explicit cache maintenance: drops every expired entry and reports cache and gate load
     */
    sweep(): MaintenanceReport {
        const removed = this.statesCache.cleanupExpired() + this.commissionsCache.cleanupExpired();
        return {
            removed,
            states: this.statesCache.stats(),
            commissions: this.commissionsCache.stats(),
            gate: {
                limit: this.gate.limit,
                active: this.gate.active,
                waiting: this.gate.waiting,
            },
        };
    }

    clearCaches(): void {
        this.statesCache.clear();
        this.commissionsCache.clear();
    }
}

export default ServiceContainer;
