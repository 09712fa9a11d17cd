/**
 * Exportações centralizadas dos use cases da camada application
 */
export { CreateUserUseCase } from './create-user.use-case.js';
export { GetUserUseCase } from './get-user.use-case.js';
export { ListUsersUseCase } from './list-users.use-case.js';
export { ReplaceUserUseCase } from './replace-user.use-case.js';
export { PartialUpdateUserUseCase } from './partial-update-user.use-case.js';
export { DeleteUserUseCase } from './delete-user.use-case.js';
export { SearchUsersUseCase } from './search-users.use-case.js';
