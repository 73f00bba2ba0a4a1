import { Router } from 'express';
import cors from 'cors';
import { AddressService } from './AddressService';

export const createAddressRoutes = (addressService: AddressService) => {
    const router = Router({ strict: true, caseSensitive: true });

    // Browsers on any origin may read the address.
    router.get(['/', '/ip'], cors(), (req, res, next) => {
        // Express also routes HEAD here; only GET is served.
        if (req.method !== 'GET') return next();
        addressService
            .getCurrentAddress()
            .then(address => {
                res.status(200).type('text/plain').send(address);
            })
            .catch(next);
    });

    return router;
};
