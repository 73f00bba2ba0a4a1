import type { Express } from 'express';
import { createAddressRoutes } from '../features/address/address.routes';
import { AddressService } from '../features/address/AddressService';
import healthRoutes from '../features/system/health.routes';
import { AppError } from '../utils/AppError';
import { ERROR_CODES } from '../../../shared/errorCodes';

export const setupRoutes = (app: Express, ipFile: string) => {
    app.use(healthRoutes);
    app.use(createAddressRoutes(new AddressService(ipFile)));

    app.use((req, res, next) => {
        next(new AppError(404, 'E_NOT_FOUND', ERROR_CODES.E_NOT_FOUND.message));
    });
};
