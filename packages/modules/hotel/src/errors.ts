import { ConflictError } from '@innkeep/shared';

/**
 * Hotel error codes (used in API error responses):
 *
 * | Code                        | HTTP | When                                   |
 * |-----------------------------|------|----------------------------------------|
 * | ROOM_NUMBER_TAKEN           | 409  | Room number already exists             |
 * | ROOM_UNDER_MAINTENANCE      | 409  | Booking targets a room in maintenance  |
 * | INVALID_STATUS_TRANSITION   | 409  | Booking action not allowed from status |
 * | VALIDATION_ERROR            | 400  | Input validation failure               |
 * | NOT_FOUND                   | 404  | Room, guest or booking does not exist  |
 */

export class RoomNumberTakenError extends ConflictError {
  constructor(roomNumber: string) {
    super(`Room number ${roomNumber} already exists`);
    this.code = 'ROOM_NUMBER_TAKEN';
  }
}

export class RoomUnderMaintenanceError extends ConflictError {
  constructor(roomNumber: string) {
    super(`Room ${roomNumber} is under maintenance`);
    this.code = 'ROOM_UNDER_MAINTENANCE';
  }
}

export class InvalidStatusTransitionError extends ConflictError {
  constructor(entity: string, from: string, to: string) {
    super(`Cannot transition ${entity} from ${from} to ${to}`);
    this.code = 'INVALID_STATUS_TRANSITION';
  }
}
