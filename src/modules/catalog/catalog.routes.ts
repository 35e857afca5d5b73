import { Router } from 'express';
import { CatalogController } from './catalog.controller';
import { CatalogService } from './catalog.service';
import { collegeParamsSchema, courseParamsSchema } from './catalog.schema';
import { validate } from '../../middlewares/validate.middleware';

export function createCatalogRouter(service: CatalogService): Router {
    const router = Router();
    const controller = new CatalogController(service);

    router.get('/colleges', controller.listColleges);
    router.get('/colleges/:collegeId/courses', validate(collegeParamsSchema), controller.getCollegeCourses);
    router.get('/courses/:courseId', validate(courseParamsSchema), controller.getCourse);
    router.get('/career-paths', controller.listCareerPaths);

    return router;
}
