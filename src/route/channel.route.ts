import { Router } from 'express';
import { ChannelService } from '../service/channel.service';
import { createChannelController } from '../controller/channel.controller';
import { asyncHandler } from '../middleware/gateway.errorHandler.middleware';
import { channelSchema, validateRequest } from '../middleware/gateway.validation.middleware';

export const createChannelRouter = (channelService: ChannelService): Router => {
  const router: Router = Router();
  const controller = createChannelController(channelService);

  router.post(
    '/channels',
    validateRequest(channelSchema),
    asyncHandler(controller.createChannel)
  );

  router.get('/channels', asyncHandler(controller.listChannels));

  router.get('/channels/:channelId', asyncHandler(controller.getChannel));

  router.put(
    '/channels/:channelId',
    validateRequest(channelSchema),
    asyncHandler(controller.updateChannel)
  );

  router.delete('/channels/:channelId', asyncHandler(controller.deleteChannel));

  return router;
};

export default createChannelRouter;
