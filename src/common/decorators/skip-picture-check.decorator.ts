import { SetMetadata } from '@nestjs/common';
import { SKIP_PICTURE_CHECK_KEY } from '../guards/picture-deadline.guard';

/**
 * Decorator to exempt an endpoint from the profile-picture deadline.
 * Use on endpoints an overdue member still needs (the upload itself,
 * login, profile lookup).
 *
 * @example
 * @SkipPictureCheck()
 * @Post('me/picture')
 * async uploadPicture() { ... }
 */
export const SkipPictureCheck = () => SetMetadata(SKIP_PICTURE_CHECK_KEY, true);
