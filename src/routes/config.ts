import { Router, Request, Response } from "express";
import { logger } from "../config/logger";
import { getConfigStore } from "../config/engine-config";
import { InvalidConfigurationError } from "../engine/errors";

const router = Router();

/**
 * GET /config
 *
 * Active engine configuration: version, preset and the scoring tables.
 */
router.get('/', (req: Request, res: Response) => {
    const config = getConfigStore().get();
    res.json({
        version: config.version,
        preset: config.preset,
        weights: config.weights,
        grades: config.grades,
        penalties: config.penalties,
        screening: config.screening
    });
});

/**
 * POST /config/reload
 *
 * Re-read the configuration tables from disk and swap them in. On a
 * validation failure the previous snapshot stays active.
 */
router.post('/reload', (req: Request, res: Response) => {
    const store = getConfigStore();
    const previous = store.get().version;

    try {
        const config = store.reload();
        res.json({
            version: config.version,
            previousVersion: previous,
            preset: config.preset
        });

    } catch (error) {
        if (error instanceof InvalidConfigurationError) {
            return res.status(400).json({
                error: 'Invalid configuration',
                details: error.issues,
                activeVersion: previous
            });
        }

        logger.error('Configuration reload failed:', error);
        res.status(500).json({
            error: 'Configuration reload failed',
            message: error instanceof Error ? error.message : 'Unknown error'
        });
    }
});

export { router as configRoutes };
