export { NotificationManager, type Notification, type Notifier } from './NotificationManager';
