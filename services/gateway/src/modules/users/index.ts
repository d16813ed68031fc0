export { GroupDirectory, type GroupRef } from './group-directory.js';
export { UserView, type UserViewDeps } from './user-view.js';
