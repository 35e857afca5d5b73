import { Request, Response, NextFunction } from 'express';
import { ApiResponse } from '../../utils/api-response';
import { PlannerService } from './planner.service';
import { RecommendationRequest, ScheduleRequest } from './planner.schema';

export class PlannerController {
    constructor(private readonly service: PlannerService) {}

    recommend = (req: Request, res: Response, next: NextFunction) => {
        try {
            // Body already parsed by the validate middleware
            const input: RecommendationRequest = req.body;
            const result = this.service.recommend(input);
            return ApiResponse.success(res, result, 'Recommendations generated');
        } catch (error) {
            next(error);
        }
    };

    schedule = async (req: Request, res: Response, next: NextFunction) => {
        try {
            const input: ScheduleRequest = req.body;
            const result = await this.service.generateSchedule(input);
            return ApiResponse.success(res, result, 'Schedule generated');
        } catch (error) {
            next(error);
        }
    };
}
