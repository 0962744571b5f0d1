import { Router } from 'express';
import { asyncHandler } from '../../api/middleware/async-handler.js';
import type { NavigationController } from './navigation.controller.js';

/**
 * Create the navigation router.
 *
 * Routes:
 * - GET /navigation                       - Navigation for the current namespace
 * - GET /navigation/namespace/:namespace  - Navigation scoped to a namespace
 */
export function navigationRouter(controller: NavigationController): Router {
    const router = Router();

    router.get('/', asyncHandler(controller.getNavigation));
    router.get('/namespace/:namespace', asyncHandler(controller.getNavigation));

    return router;
}
