import { Request, Response, NextFunction } from 'express';
import { ApiResponse } from '../../utils/api-response';
import { CatalogService } from './catalog.service';

export class CatalogController {
    constructor(private readonly service: CatalogService) {}

    listColleges = (req: Request, res: Response, next: NextFunction) => {
        try {
            return ApiResponse.success(res, this.service.listColleges(), 'Colleges fetched');
        } catch (error) {
            next(error);
        }
    };

    getCollegeCourses = (req: Request, res: Response, next: NextFunction) => {
        try {
            const { collegeId } = req.params;
            const courses = this.service.getOfferedCourses(collegeId);
            return ApiResponse.success(res, courses, 'College courses fetched');
        } catch (error) {
            next(error);
        }
    };

    getCourse = (req: Request, res: Response, next: NextFunction) => {
        try {
            const { courseId } = req.params;
            return ApiResponse.success(res, this.service.getCourse(courseId), 'Course fetched');
        } catch (error) {
            next(error);
        }
    };

    listCareerPaths = (req: Request, res: Response, next: NextFunction) => {
        try {
            return ApiResponse.success(res, this.service.listCareerPaths(), 'Career paths fetched');
        } catch (error) {
            next(error);
        }
    };
}
