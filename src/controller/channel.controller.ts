import { Request, Response } from 'express';
import { ChannelService } from '../service/channel.service';
import { ChannelInput } from '../middleware/gateway.validation.middleware';
import { NotFoundError } from '../middleware/gateway.errorHandler.middleware';

export const createChannelController = (channelService: ChannelService) => {

  const createChannel = async (req: Request, res: Response): Promise<void> => {
    const fields: ChannelInput = req.body;
    const registration = await channelService.create(fields);

    // The secret token is only ever disclosed here
    res.status(201).json(registration);
  };

  const listChannels = async (_req: Request, res: Response): Promise<void> => {
    res.status(200).json(await channelService.list());
  };

  const getChannel = async (req: Request, res: Response): Promise<void> => {
    const channel = await channelService.get(req.params.channelId);
    if (!channel) {
      throw new NotFoundError('Channel not found');
    }
    res.status(200).json(channel);
  };

  const updateChannel = async (req: Request, res: Response): Promise<void> => {
    const fields: ChannelInput = req.body;
    const channel = await channelService.update(req.params.channelId, fields);
    if (!channel) {
      throw new NotFoundError('Channel not found');
    }
    res.status(200).json(channel);
  };

  const deleteChannel = async (req: Request, res: Response): Promise<void> => {
    const removed = await channelService.delete(req.params.channelId);
    if (!removed) {
      throw new NotFoundError('Channel not found');
    }
    res.status(200).json({ status: 'deleted' });
  };

  return {
    createChannel,
    listChannels,
    getChannel,
    updateChannel,
    deleteChannel
  };
};
