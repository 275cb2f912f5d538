import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { ContainerStatus } from './entities/container.entity';
import { ContainerStatusChangeMessage } from './dto/container-status-change.dto';

/** Channel the containers trigger publishes status changes on (LISTEN container_status_change). */
export const CONTAINER_STATUS_CHANGE_CHANNEL = 'container_status_change';

export const CONTAINER_STATUS_NOTIFY_MIGRATION = 'container_status_notify';

const NOTIFY_FUNCTION = `CREATE OR REPLACE FUNCTION notify_container_status_change()
RETURNS TRIGGER AS $$
BEGIN
  IF OLD.status IS DISTINCT FROM NEW.status THEN
    PERFORM pg_notify(
      '${CONTAINER_STATUS_CHANGE_CHANNEL}',
      json_build_object(
        'id', NEW.id,
        'user_id', NEW.user_id,
        'name', NEW.name,
        'old_status', OLD.status,
        'new_status', NEW.status,
        'updated_at', NEW.updated_at
      )::text
    );
  END IF;
  RETURN NEW;
END;
$$ LANGUAGE plpgsql;`;

const NOTIFY_TRIGGER = `CREATE TRIGGER container_status_change_trigger
AFTER UPDATE ON containers
FOR EACH ROW
EXECUTE FUNCTION notify_container_status_change();`;

export const CONTAINER_STATUS_NOTIFY_UP: readonly string[] = [NOTIFY_FUNCTION, NOTIFY_TRIGGER];

export const DROP_CONTAINER_STATUS_NOTIFY_FUNCTION = 'DROP FUNCTION IF EXISTS notify_container_status_change();';

// trigger first, it depends on the function
export const CONTAINER_STATUS_NOTIFY_DOWN: readonly string[] = [
  'DROP TRIGGER IF EXISTS container_status_change_trigger ON containers;',
  DROP_CONTAINER_STATUS_NOTIFY_FUNCTION,
];

export interface ContainerStatusChange {
  id: string;
  userId: string;
  name: string;
  oldStatus: ContainerStatus;
  newStatus: ContainerStatus;
  updatedAt: string;
}

export class ContainerStatusPayloadError extends Error {
  constructor(reason: string) {
    super(`Invalid ${CONTAINER_STATUS_CHANGE_CHANNEL} payload: ${reason}`);
    this.name = 'ContainerStatusPayloadError';
  }
}

/**
 * Parses the JSON text a listener receives on `container_status_change`.
 */
export function parseContainerStatusChange(payload: string): ContainerStatusChange {
  let raw: unknown;
  try {
    raw = JSON.parse(payload);
  } catch (error) {
    throw new ContainerStatusPayloadError(error instanceof Error ? error.message : String(error));
  }
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ContainerStatusPayloadError('expected a JSON object');
  }

  const message = plainToInstance(ContainerStatusChangeMessage, raw);
  const errors = validateSync(message);
  if (errors.length > 0) {
    throw new ContainerStatusPayloadError(errors.map((error) => error.property).join(', '));
  }

  return {
    id: message.id,
    userId: message.userId,
    name: message.name,
    oldStatus: message.oldStatus,
    newStatus: message.newStatus,
    updatedAt: message.updatedAt,
  };
}
