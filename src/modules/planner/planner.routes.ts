import { Router } from 'express';
import { PlannerController } from './planner.controller';
import { PlannerService } from './planner.service';
import { recommendationRequestSchema, scheduleRequestSchema } from './planner.schema';
import { validate } from '../../middlewares/validate.middleware';

export function createPlannerRouter(service: PlannerService): Router {
    const router = Router();
    const controller = new PlannerController(service);

    router.post('/recommendations', validate(recommendationRequestSchema), controller.recommend);
    router.post('/schedule', validate(scheduleRequestSchema), controller.schedule);

    return router;
}
