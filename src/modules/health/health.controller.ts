import { Request, Response } from 'express';
import { CatalogService } from '../catalog/catalog.service';
import { WorkloadNarrator } from '../workload/workload.types';

export class HealthController {
    constructor(
        private readonly catalogService: CatalogService,
        private readonly narrator: WorkloadNarrator
    ) {}

    public check = (req: Request, res: Response) => {
        const catalog = this.catalogService.stats();
        const healthStatus = {
            status: catalog.courses > 0 && catalog.colleges > 0 ? 'ok' : 'degraded',
            timestamp: new Date().toISOString(),
            uptime: process.uptime(),
            services: {
                catalog,
                narrator: this.narrator.mode,
            },
        };

        return res.status(200).json(healthStatus);
    };
}
